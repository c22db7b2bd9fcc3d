import * as path from 'path';
import { z } from 'zod';
import { exists, findFileUp, readJson } from './util/files';
import * as log from './util/log';
import { ConfigError } from './errors';
import { DEFAULT_BASE_URL } from './sources/remote-listing';

export const CONFIG_FILE_NAME = 'solc-sync.json';

export const DEFAULT_PLATFORM = 'linux-amd64';
export const DEFAULT_WORKERS = 3;
export const DEFAULT_RETRIES = 3;

export type SourceMode =
  | { readonly type: 'remote'; readonly baseUrl: string }
  | { readonly type: 'local'; readonly root: string };

/**
 * Everything a sync run needs, resolved once at startup
 */
export interface SyncConfig {
  readonly mode: SourceMode;
  readonly platform: string;
  readonly bucket: string;
  readonly region?: string;
  readonly profile?: string;
  readonly prefix?: string;
  readonly workers: number;
  readonly limit?: number;
  readonly retries: number;
  readonly verifyHashFile: boolean;
}

/**
 * Values given on the command line
 */
export interface ConfigFlags {
  readonly bucket?: string;
  readonly localDir?: string;
  readonly limit?: number;
  readonly workers?: number;
  readonly region?: string;
  readonly profile?: string;
  readonly prefix?: string;
  readonly platform?: string;
  readonly baseUrl?: string;
  readonly retries?: number;
  readonly verifyHashFile?: boolean;
}

const ConfigFileSchema = z.object({
  bucket: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  profile: z.string().min(1).optional(),
  prefix: z.string().optional(),
  platform: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  localDir: z.string().min(1).optional(),
  workers: z.number().int().min(1).optional(),
  retries: z.number().int().min(0).optional(),
  verifyHashFile: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Read the config file named explicitly, or the nearest one upwards from `cwd`
 *
 * Relative `localDir` paths are taken relative to the file.
 */
export async function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): Promise<ConfigFile> {
  let fileName: string | undefined;
  if (explicitPath !== undefined) {
    fileName = path.resolve(cwd, explicitPath);
    if (!await exists(fileName)) {
      throw new ConfigError(`Config file not found: ${fileName}`);
    }
  } else {
    fileName = await findFileUp(CONFIG_FILE_NAME, cwd);
    if (fileName === undefined) { return {}; }
  }

  log.debug(`Reading configuration from ${fileName}`);
  const config = parseConfigFile(await readJson(fileName), fileName);
  if (config.localDir !== undefined) {
    return { ...config, localDir: path.resolve(path.dirname(fileName), config.localDir) };
  }
  return config;
}

export function parseConfigFile(json: unknown, fileName: string): ConfigFile {
  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid ${fileName}: ${problems.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Combine flags, environment and config file; earlier sources win
 */
export function resolveConfig(flags: ConfigFlags, env: Record<string, string | undefined>, file: ConfigFile = {}): SyncConfig {
  const bucket = nonEmpty(flags.bucket) ?? nonEmpty(env.S3_BUCKET) ?? file.bucket;
  if (bucket === undefined) {
    throw new ConfigError(`No bucket given: use --bucket, $S3_BUCKET or "bucket" in ${CONFIG_FILE_NAME}`);
  }

  const platform = flags.platform ?? file.platform ?? DEFAULT_PLATFORM;
  if (!/^[A-Za-z0-9._-]+$/.test(platform)) {
    throw new ConfigError(`Invalid platform: ${platform}`);
  }

  const localDir = flags.localDir ?? file.localDir;
  const mode: SourceMode = localDir !== undefined
    ? { type: 'local', root: path.resolve(localDir) }
    : { type: 'remote', baseUrl: flags.baseUrl ?? file.baseUrl ?? DEFAULT_BASE_URL };

  return {
    mode,
    platform,
    bucket,
    region: nonEmpty(flags.region) ?? nonEmpty(env.AWS_REGION) ?? file.region,
    profile: nonEmpty(flags.profile) ?? nonEmpty(env.AWS_PROFILE) ?? file.profile,
    prefix: flags.prefix ?? file.prefix,
    workers: checkInteger('workers', flags.workers ?? file.workers ?? DEFAULT_WORKERS, 1),
    limit: flags.limit !== undefined ? checkInteger('limit', flags.limit, 0) : undefined,
    retries: checkInteger('retries', flags.retries ?? file.retries ?? DEFAULT_RETRIES, 0),
    verifyHashFile: flags.verifyHashFile ?? file.verifyHashFile ?? true,
  };
}

function checkInteger(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`--${name} must be an integer >= ${min}, got: ${value}`);
  }
  return value;
}

function nonEmpty(x: string | undefined) {
  return x === undefined || x === '' ? undefined : x;
}

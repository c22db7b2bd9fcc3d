#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runSync } from '../lib/commands/sync';
import { loadConfigFile, resolveConfig } from '../lib/config';
import { SimpleError } from '../lib/util/flow';
import * as log from '../lib/util/log';

async function main() {
  const argv = yargs(hideBin(process.argv))
    .usage('$0 [options]')
    .option('bucket', {
      type: 'string',
      desc: 'Destination bucket (default: $S3_BUCKET)',
      requiresArg: true,
    })
    .option('local-dir', {
      type: 'string',
      desc: 'Upload the compilers found in this directory instead of the official binaries',
      requiresArg: true,
    })
    .option('limit', {
      type: 'number',
      desc: 'Only process the first N versions',
      requiresArg: true,
    })
    .option('workers', {
      type: 'number',
      desc: 'Number of versions to transfer concurrently (default 3)',
      requiresArg: true,
    })
    .option('region', {
      type: 'string',
      desc: 'Bucket region (default: $AWS_REGION)',
      requiresArg: true,
    })
    .option('profile', {
      type: 'string',
      desc: 'AWS profile to use (default: $AWS_PROFILE)',
      requiresArg: true,
    })
    .option('prefix', {
      type: 'string',
      desc: 'Key prefix inside the bucket',
      requiresArg: true,
    })
    .option('platform', {
      type: 'string',
      desc: 'Compiler platform (default linux-amd64)',
      requiresArg: true,
    })
    .option('base-url', {
      type: 'string',
      desc: 'Location of the official binary listing',
      requiresArg: true,
    })
    .option('retries', {
      type: 'number',
      desc: 'Retries for transient download errors (default 3)',
      requiresArg: true,
    })
    .option('verify-hash-file', {
      type: 'boolean',
      desc: 'Only skip versions whose hash file is also present (default true)',
    })
    .option('config', {
      type: 'string',
      desc: 'Config file (default: nearest solc-sync.json)',
      requiresArg: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      desc: 'Increase logging verbosity',
      default: false,
    })
    .help()
    .strict()
    .showHelpOnFail(false)
    .parseSync();

  log.setVerbose(argv.verbose);
  log.markStartTime();

  const config = resolveConfig({
    bucket: argv.bucket,
    localDir: argv.localDir,
    limit: argv.limit,
    workers: argv.workers,
    region: argv.region,
    profile: argv.profile,
    prefix: argv.prefix,
    platform: argv.platform,
    baseUrl: argv.baseUrl,
    retries: argv.retries,
    verifyHashFile: argv.verifyHashFile,
  }, process.env, await loadConfigFile(argv.config));

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.error(`Received ${signal} again, exiting`);
      process.exit(130);
    }
    log.warning(`Received ${signal}: finishing in-flight transfers, not starting new ones`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const summary = await runSync(config, {}, { signal: controller.signal });
  if (!summary.ok) {
    process.exitCode = 1;
  }
}

main().catch(e => {
  if (e instanceof SimpleError) {
    log.error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
  process.exitCode = 1;
});

import {
  GetObjectCommandInput,
  GetObjectCommandOutput,
  HeadObjectCommandInput,
  HeadObjectCommandOutput,
  NotFound,
  PutObjectCommandInput,
  PutObjectCommandOutput,
  S3,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { fromEnv } from '@aws-sdk/credential-provider-env';
import { fromIni } from '@aws-sdk/credential-provider-ini';
import * as log from '../util/log';
import { IObjectStore } from './object-store';

/**
 * The part of the S3 client we use
 */
export interface S3Api {
  headObject(input: HeadObjectCommandInput): Promise<HeadObjectCommandOutput>;
  getObject(input: GetObjectCommandInput): Promise<GetObjectCommandOutput>;
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
}

export interface S3StoreOptions {
  readonly bucketName: string;
  readonly region?: string;

  /**
   * Named profile from the shared AWS config files
   */
  readonly profileName?: string;
}

export class S3ObjectStore implements IObjectStore {
  public static create(options: S3StoreOptions) {
    let credentials: ReturnType<typeof fromEnv> | undefined;
    if (options.profileName) {
      log.debug(`Using bucket '${options.bucketName}' with profile '${options.profileName}'`);
      credentials = fromIni({ profile: options.profileName });
    } else if (process.env.AWS_ACCESS_KEY_ID) {
      log.debug(`Using bucket '${options.bucketName}' with $AWS_ACCESS_KEY_ID credentials`);
      credentials = fromEnv();
    } else {
      log.debug(`Using bucket '${options.bucketName}' with the default credential chain`);
    }

    return new S3ObjectStore(new S3({ region: options.region, credentials }), options.bucketName);
  }

  public readonly displayName: string;

  constructor(private readonly s3: S3Api, private readonly bucketName: string) {
    this.displayName = `s3://${bucketName}`;
  }

  public async exists(key: string): Promise<boolean> {
    try {
      await this.s3.headObject({ Bucket: this.bucketName, Key: key });
      return true;
    } catch (e) {
      if (isNotFound(e)) { return false; }
      throw e;
    }
  }

  public async get(key: string): Promise<Uint8Array> {
    const response = await this.s3.getObject({ Bucket: this.bucketName, Key: key });
    if (!response.Body) {
      throw new Error(`Empty response body for s3://${this.bucketName}/${key}`);
    }
    return response.Body.transformToByteArray();
  }

  public async put(key: string, body: Uint8Array, contentType?: string): Promise<void> {
    await this.s3.putObject({
      Bucket: this.bucketName,
      Key: key,
      Body: body,
      ContentType: contentType,
    });
    log.debug(`Uploaded s3://${this.bucketName}/${key} (${body.length} bytes)`);
  }
}

function isNotFound(e: unknown) {
  if (e instanceof NotFound) { return true; }
  return e instanceof S3ServiceException && e.$metadata.httpStatusCode === 404;
}

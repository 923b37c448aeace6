import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { PRESIGNED_URL_EXPIRY_SECONDS } from '@report-merge/shared';
import type { MinioSettings } from '../config/settings';
import { logger } from '../logger';

/**
 * Object storage as the merge sees it: fetch bytes by key, store bytes and
 * get back a URL the caller can hand out.
 */
export interface ObjectStore {
  get(key: string): Promise<Buffer>;
  put(key: string, body: Buffer, contentType: string): Promise<string>;
}

/**
 * S3-compatible store for MinIO. The bucket is created on first upload when
 * it does not exist yet; uploads return a pre-signed GET URL.
 */
export class S3ObjectStore implements ObjectStore {
  private bucketReady: Promise<void> | null = null;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly urlExpirySeconds = PRESIGNED_URL_EXPIRY_SECONDS,
  ) {}

  static fromSettings(settings: MinioSettings): S3ObjectStore {
    const client = new S3Client({
      endpoint: settings.endpoint,
      region: settings.region,
      credentials: {
        accessKeyId: settings.accessKey,
        secretAccessKey: settings.secretKey,
      },
      forcePathStyle: true, // Required for MinIO
    });
    return new S3ObjectStore(client, settings.bucket);
  }

  async get(key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Object ${this.bucket}/${key} has no body`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    await this.ensureBucket();
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
    }));
    const command = new GetObjectCommand({ Bucket: this.bucket, Key: key });
    return getSignedUrl(this.client, command, { expiresIn: this.urlExpirySeconds });
  }

  private ensureBucket(): Promise<void> {
    this.bucketReady ??= this.createBucketIfMissing().catch((err: unknown) => {
      this.bucketReady = null;
      throw err;
    });
    return this.bucketReady;
  }

  private async createBucketIfMissing(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      const status = err instanceof Error && '$metadata' in err ? httpStatus(err.$metadata) : undefined;
      if (status !== 404 && !(err instanceof Error && err.name === 'NotFound')) {
        throw err;
      }
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      logger.info({ bucket: this.bucket }, 'Created storage bucket');
    }
  }
}

function httpStatus(metadata: unknown): number | undefined {
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

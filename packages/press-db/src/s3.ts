import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  CopyObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
} from '@aws-sdk/client-s3';

export interface S3Settings {
  endpoint?: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
}

export interface S3Api {
  ensureBucket(bucket: string): Promise<void>;
  putObject(bucket: string, key: string, bytes: Buffer, contentType: string): Promise<void>;
  getObjectBytes(bucket: string, key: string): Promise<Buffer>;
  copyObject(bucket: string, fromKey: string, toKey: string): Promise<void>;
}

export function createS3(settings: S3Settings): S3Api {
  const s3 = new S3Client({
    region: settings.region,
    endpoint: settings.endpoint,
    forcePathStyle: settings.forcePathStyle,
    credentials: {
      accessKeyId: settings.accessKeyId,
      secretAccessKey: settings.secretAccessKey,
    },
  });

  async function ensureBucket(bucket: string) {
    try {
      await s3.send(new HeadBucketCommand({ Bucket: bucket }));
    } catch {
      await s3.send(new CreateBucketCommand({ Bucket: bucket }));
    }
  }

  async function putObject(bucket: string, key: string, bytes: Buffer, contentType: string) {
    await s3.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
      })
    );
  }

  async function getObjectBytes(bucket: string, key: string) {
    const res = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!res.Body) throw new Error('S3 returned empty body');
    return Buffer.from(await res.Body.transformToByteArray());
  }

  async function copyObject(bucket: string, fromKey: string, toKey: string) {
    await s3.send(
      new CopyObjectCommand({
        Bucket: bucket,
        CopySource: `${bucket}/${encodeURIComponent(fromKey)}`,
        Key: toKey,
      })
    );
  }

  return { ensureBucket, putObject, getObjectBytes, copyObject };
}

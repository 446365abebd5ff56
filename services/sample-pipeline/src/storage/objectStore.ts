import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { Readable } from 'node:stream';
import type { ServiceConfig } from '../config/serviceConfig';

export type PutObjectInput = {
  bucket: string;
  key: string;
  body: Readable;
  contentLength: number;
  contentType?: string;
};

/** Byte-stream PUT sink for finished samples. */
export interface ObjectStore {
  putObject(input: PutObjectInput): Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.gz': 'application/gzip'
};

export function contentTypeFor(extension: string): string | undefined {
  return CONTENT_TYPES[extension.toLowerCase()];
}

export function createS3Client(config: ServiceConfig['storage']): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey
          }
        : undefined
  });
}

export function createS3ObjectStore(client: S3Client): ObjectStore {
  return {
    async putObject(input) {
      await client.send(
        new PutObjectCommand({
          Bucket: input.bucket,
          Key: input.key,
          Body: input.body,
          ContentLength: input.contentLength,
          ContentType: input.contentType
        })
      );
    }
  };
}

import {
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { PutObjectCommandInput, S3Client } from '@aws-sdk/client-s3';
import { ObjectConflictError } from './errors.js';
import type { ObjectStore, ObjectSummary, PutObjectParams } from './types.js';

const CONFLICT_ERROR_NAMES = new Set(['PreconditionFailed', 'ConditionalRequestConflict']);

/** 조건부 PUT 위반 (412 / PreconditionFailed) */
export function isConflictError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  if (CONFLICT_ERROR_NAMES.has(error.name)) return true;
  return error.$metadata.httpStatusCode === 412;
}

export function isMissingKeyError(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  return error instanceof S3ServiceException && error.name === 'NoSuchKey';
}

export function buildPutObjectInput(bucket: string, params: PutObjectParams): PutObjectCommandInput {
  const input: PutObjectCommandInput = {
    Bucket: bucket,
    Key: params.key,
    Body: params.body,
    ContentType: params.contentType,
  };

  if (params.encrypt) {
    input.ServerSideEncryption = 'aws:kms';
    if (params.kmsKeyId) input.SSEKMSKeyId = params.kmsKeyId;
  }
  if (params.ifNoneMatch) {
    input.IfNoneMatch = '*';
  }

  return input;
}

/**
 * S3 버킷 위의 ObjectStore 구현
 */
export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
  ) {}

  async putObject(params: PutObjectParams): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand(buildPutObjectInput(this.bucket, params)));
    } catch (error) {
      if (isConflictError(error)) throw new ObjectConflictError(params.key);
      throw error;
    }
  }

  async getObject(key: string): Promise<string | null> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!res.Body) return '';
      return await res.Body.transformToString('utf-8');
    } catch (error) {
      if (isMissingKeyError(error)) return null;
      throw error;
    }
  }

  async listObjects(prefix: string): Promise<ObjectSummary[]> {
    const out: ObjectSummary[] = [];
    let continuationToken: string | undefined;

    do {
      const res = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
      );

      for (const obj of res.Contents ?? []) {
        if (!obj.Key) continue;
        out.push({
          key: obj.Key,
          size: obj.Size ?? 0,
          lastModified: obj.LastModified ? obj.LastModified.toISOString() : null,
        });
      }

      continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
    } while (continuationToken);

    return out;
  }
}

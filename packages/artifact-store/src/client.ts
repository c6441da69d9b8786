import { S3Client } from '@aws-sdk/client-s3';

export type S3ClientConfig = {
  region: string;
  requestTimeoutMs: number;
};

let s3Instance: S3Client | null = null;

/**
 * 프로세스 단위로 캐시되는 S3 클라이언트
 * SDK 재시도는 끄고(maxAttempts: 1), 타임아웃만 건다.
 */
export function getS3Client(config: S3ClientConfig): S3Client {
  if (!s3Instance) {
    s3Instance = new S3Client({
      region: config.region,
      maxAttempts: 1,
      requestHandler: { requestTimeout: config.requestTimeoutMs },
    });
  }
  return s3Instance;
}

export function resetS3Client(): void {
  s3Instance = null;
}

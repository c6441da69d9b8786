/**
 * 아티팩트 저장소 에러 클래스
 */

export class ArtifactWriteFailedError extends Error {
  storagePath: string;

  constructor(storagePath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`[artifact-store] 아티팩트 저장 실패 (${storagePath})${reason}`, options);
    this.name = 'ArtifactWriteFailedError';
    this.storagePath = storagePath;
  }
}

export class ArtifactNotFoundError extends Error {
  storagePath: string;

  constructor(storagePath: string) {
    super(`[artifact-store] 아티팩트 없음: ${storagePath}`);
    this.name = 'ArtifactNotFoundError';
    this.storagePath = storagePath;
  }
}

/** If-None-Match 조건 위반 (같은 키가 이미 존재) */
export class ObjectConflictError extends Error {
  key: string;

  constructor(key: string) {
    super(`[artifact-store] 이미 존재하는 키: ${key}`);
    this.name = 'ObjectConflictError';
    this.key = key;
  }
}

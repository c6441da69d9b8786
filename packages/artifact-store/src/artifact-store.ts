import { DateTime } from 'luxon';
import { z } from 'zod';
import { createLogger, toIsoString } from '@workspace/shared-utils';
import { AUDIT_ID_PREFIX, generateArtifactId, idPrefixFor, randomIdSuffix } from './artifact-id.js';
import { ArtifactNotFoundError, ArtifactWriteFailedError, ObjectConflictError } from './errors.js';
import { artifactPath, auditLogPath, listPrefix, parseArtifactPath } from './paths.js';
import type {
  ArtifactKind,
  ArtifactPayload,
  ArtifactSummary,
  AuditEntry,
  ObjectStore,
  PutArtifactOptions,
  StoredArtifact,
  StoredAuditEntry,
} from './types.js';
import { isReportType } from './types.js';

const logger = createLogger('artifact-store');

const JSON_CONTENT_TYPE = 'application/json';
const DEFAULT_SERVICE_NAME = 'compliance-copilot';
const DEFAULT_MAX_ID_ATTEMPTS = 3;

const ArtifactDocumentSchema = z.record(z.string(), z.unknown());

export type ArtifactStoreOptions = {
  /** KMS 키 ID. 있으면 기본적으로 모든 쓰기를 암호화 요청 */
  kmsKeyId?: string;
  /** 기본 암호화 여부 (미지정 시 kmsKeyId 유무) */
  encryptByDefault?: boolean;
  /** 감사 로그의 service 필드 */
  serviceName?: string;
  /** ID 충돌 시 재발급 최대 횟수 */
  maxIdAttempts?: number;
  /** 테스트 교체용 */
  clock?: () => DateTime;
  idSuffix?: () => string;
};

/**
 * 분석 리포트 / SAR / 감사 로그 JSON 저장소
 *
 * 경로 규칙:
 * - reports/<report_type>/<customer_id>/<report_id>.json
 * - sars/<customer_id>/<sar_id>.json
 * - audit-logs/<yyyy>/<LL>/<dd>/<log_id>.json
 *
 * 모든 쓰기는 If-None-Match 조건부 PUT이라 한 번 저장된 아티팩트는 덮어쓰지 않는다.
 */
export class ArtifactStore {
  private readonly kmsKeyId: string | undefined;
  private readonly encryptByDefault: boolean;
  private readonly serviceName: string;
  private readonly maxIdAttempts: number;
  private readonly clock: () => DateTime;
  private readonly idSuffix: () => string;

  constructor(
    private readonly objects: ObjectStore,
    options: ArtifactStoreOptions = {},
  ) {
    this.kmsKeyId = options.kmsKeyId;
    this.encryptByDefault = options.encryptByDefault ?? Boolean(options.kmsKeyId);
    this.serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
    this.maxIdAttempts = Math.max(1, options.maxIdAttempts ?? DEFAULT_MAX_ID_ATTEMPTS);
    this.clock = options.clock ?? (() => DateTime.utc());
    this.idSuffix = options.idSuffix ?? randomIdSuffix;
  }

  /**
   * 아티팩트 저장
   *
   * payload에 ID 필드(report_id | sar_id), created_at, customer_id (+ report_type)를
   * 덧붙여 저장한다. 원본 payload 객체는 변경하지 않는다.
   */
  async put(
    kind: ArtifactKind,
    subjectId: string,
    payload: ArtifactPayload,
    options: PutArtifactOptions = {},
  ): Promise<StoredArtifact> {
    const encrypt = options.encrypt ?? this.encryptByDefault;
    const idField = isReportType(kind) ? 'report_id' : 'sar_id';

    const stored = await this.writeWithFreshId({
      prefix: idPrefixFor(kind),
      pathFor: (id) => artifactPath(kind, subjectId, id),
      documentFor: (id, createdAt) => ({
        ...payload,
        [idField]: id,
        created_at: createdAt,
        customer_id: subjectId,
        ...(isReportType(kind) ? { report_type: kind } : {}),
      }),
      encrypt,
    });

    logger.info('아티팩트 저장 완료', {
      kind,
      customerId: subjectId,
      artifactId: stored.id,
      encrypted: encrypt,
    });

    return {
      artifact_id: stored.id,
      storage_path: stored.path,
      encrypted: encrypt,
      created_at: stored.createdAt,
    };
  }

  /**
   * 아티팩트 조회
   *
   * @throws ArtifactNotFoundError 키가 없을 때
   */
  async get(kind: ArtifactKind, subjectId: string, artifactId: string): Promise<ArtifactPayload> {
    const path = artifactPath(kind, subjectId, artifactId);
    const body = await this.objects.getObject(path);

    if (body === null) {
      throw new ArtifactNotFoundError(path);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      logger.error('아티팩트 JSON 파싱 실패', { path, error });
      throw new Error(`[artifact-store] 아티팩트 JSON 파싱 실패: ${path}`, { cause: error });
    }

    return ArtifactDocumentSchema.parse(parsed);
  }

  /** 종류별(선택적으로 고객별) 아티팩트 목록 */
  async list(kind: ArtifactKind, subjectId?: string): Promise<ArtifactSummary[]> {
    const objects = await this.objects.listObjects(listPrefix(kind, subjectId));

    const summaries = objects
      .filter((o) => o.key.endsWith('.json'))
      .map((o) => {
        const { customerId, artifactId } = parseArtifactPath(kind, o.key);
        return {
          artifact_id: artifactId,
          storage_path: o.key,
          size: o.size,
          last_modified: o.lastModified,
          customer_id: customerId,
        };
      });

    logger.debug('아티팩트 목록 조회', { kind, customerId: subjectId ?? null, count: summaries.length });

    return summaries;
  }

  /**
   * 감사 로그 추가 (append-only)
   */
  async appendAuditEntry(
    action: string,
    details: Record<string, unknown>,
    userId = 'system',
  ): Promise<StoredAuditEntry> {
    const encrypt = this.encryptByDefault;

    const stored = await this.writeWithFreshId({
      prefix: AUDIT_ID_PREFIX,
      pathFor: (id, at) => auditLogPath(at, id),
      documentFor: (id, timestamp) => {
        const entry: AuditEntry = {
          log_id: id,
          action,
          details,
          user_id: userId,
          timestamp,
          service: this.serviceName,
        };
        return { ...entry };
      },
      encrypt,
    });

    logger.info('감사 로그 기록 완료', { logId: stored.id, action });

    return {
      log_id: stored.id,
      storage_path: stored.path,
      status: 'logged',
      encrypted: encrypt,
      timestamp: stored.createdAt,
    };
  }

  private async writeWithFreshId(params: {
    prefix: string;
    pathFor: (id: string, at: DateTime) => string;
    documentFor: (id: string, createdAt: string) => ArtifactPayload;
    encrypt: boolean;
  }): Promise<{ id: string; path: string; createdAt: string }> {
    let lastPath = '';

    for (let attempt = 1; attempt <= this.maxIdAttempts; attempt++) {
      const now = this.clock();
      const createdAt = toIsoString(now);
      const id = generateArtifactId(params.prefix, now, this.idSuffix);
      const path = params.pathFor(id, now);
      lastPath = path;

      try {
        await this.objects.putObject({
          key: path,
          body: JSON.stringify(params.documentFor(id, createdAt), null, 2),
          contentType: JSON_CONTENT_TYPE,
          encrypt: params.encrypt,
          kmsKeyId: params.encrypt ? this.kmsKeyId : undefined,
          ifNoneMatch: true,
        });
        return { id, path, createdAt };
      } catch (error) {
        if (error instanceof ObjectConflictError) {
          logger.warn('아티팩트 ID 충돌 → 재발급', { path, attempt });
          continue;
        }

        logger.error('아티팩트 저장 실패', { path, error });
        throw new ArtifactWriteFailedError(path, { cause: error });
      }
    }

    logger.error('아티팩트 ID 재발급 한도 초과', { path: lastPath, attempts: this.maxIdAttempts });
    throw new ArtifactWriteFailedError(lastPath, {
      cause: new ObjectConflictError(lastPath),
    });
  }
}

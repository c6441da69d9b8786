import type { DateTime } from 'luxon';
import { datePath } from '@workspace/shared-utils';
import type { ArtifactKind } from './types.js';
import { isReportType } from './types.js';

/** 종류별 최상위 prefix (reports/<type>, sars) */
export function kindPrefix(kind: ArtifactKind): string {
  return isReportType(kind) ? `reports/${kind}` : 'sars';
}

/** 목록 조회용 prefix. subjectId가 있으면 해당 고객으로 좁힌다 */
export function listPrefix(kind: ArtifactKind, subjectId?: string): string {
  return subjectId ? `${kindPrefix(kind)}/${subjectId}/` : `${kindPrefix(kind)}/`;
}

export function artifactPath(kind: ArtifactKind, subjectId: string, artifactId: string): string {
  return `${kindPrefix(kind)}/${subjectId}/${artifactId}.json`;
}

/** 감사 로그는 고객이 아니라 일자 단위로 묶는다 */
export function auditLogPath(at: DateTime, logId: string): string {
  return `audit-logs/${datePath(at)}/${logId}.json`;
}

/**
 * 저장 경로 → (customer_id, artifact_id)
 * reports/<type>/<customer>/<id>.json, sars/<customer>/<id>.json 두 형태만 인식
 */
export function parseArtifactPath(
  kind: ArtifactKind,
  key: string,
): { customerId: string | null; artifactId: string } {
  const prefix = `${kindPrefix(kind)}/`;
  const rest = key.startsWith(prefix) ? key.slice(prefix.length) : key;
  const parts = rest.split('/');
  const fileName = parts[parts.length - 1] ?? rest;
  const artifactId = fileName.endsWith('.json') ? fileName.slice(0, -'.json'.length) : fileName;

  return {
    customerId: parts.length > 1 ? (parts[0] ?? null) : null,
    artifactId,
  };
}

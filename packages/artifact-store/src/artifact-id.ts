import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { compactDate } from '@workspace/shared-utils';
import type { ArtifactKind } from './types.js';
import { isReportType } from './types.js';

export const SAR_ID_PREFIX = 'SAR';
export const AUDIT_ID_PREFIX = 'AUDIT';

export function randomIdSuffix(): string {
  return uuidv4().slice(0, 8);
}

export function idPrefixFor(kind: ArtifactKind): string {
  return isReportType(kind) ? kind.toUpperCase() : SAR_ID_PREFIX;
}

/**
 * 아티팩트 ID: {PREFIX}-{yyyyLLdd}-{8자리 hex}, 전체 대문자
 * 예) KYC_ANALYSIS-20250304-9F1C2A7B
 */
export function generateArtifactId(
  prefix: string,
  now: DateTime = DateTime.utc(),
  suffix: () => string = randomIdSuffix,
): string {
  return `${prefix}-${compactDate(now)}-${suffix()}`.toUpperCase();
}

// =============================================================================
// Artifact kinds
// =============================================================================
export const REPORT_TYPES = ['kyc_analysis', 'transaction_analysis', 'comprehensive_analysis'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export type ArtifactKind = ReportType | 'sar';

export function isReportType(kind: ArtifactKind): kind is ReportType {
  return kind !== 'sar';
}

// =============================================================================
// Stored artifacts
// =============================================================================
export type ArtifactPayload = Record<string, unknown>;

export interface StoredArtifact {
  artifact_id: string;
  storage_path: string;
  encrypted: boolean;
  created_at: string;
}

export interface ArtifactSummary {
  artifact_id: string;
  storage_path: string;
  size: number;
  last_modified: string | null;
  customer_id: string | null;
}

export interface PutArtifactOptions {
  /** 미지정 시 스토어 기본값(KMS 키 설정 여부)을 따른다 */
  encrypt?: boolean;
}

// =============================================================================
// Audit Logs
// =============================================================================
export interface AuditEntry {
  log_id: string;
  action: string;
  details: Record<string, unknown>;
  user_id: string;
  timestamp: string;
  service: string;
}

export interface StoredAuditEntry {
  log_id: string;
  storage_path: string;
  status: 'logged';
  encrypted: boolean;
  timestamp: string;
}

// =============================================================================
// Object store port
// =============================================================================
export interface PutObjectParams {
  key: string;
  body: string;
  contentType: string;
  /** true면 서버측 암호화(aws:kms) 요청. 키가 없으면 계정 기본 KMS 키 사용 */
  encrypt: boolean;
  kmsKeyId?: string;
  /** true면 같은 키가 이미 있을 때 ObjectConflictError */
  ifNoneMatch?: boolean;
}

export interface ObjectSummary {
  key: string;
  size: number;
  lastModified: string | null;
}

export interface ObjectStore {
  putObject(params: PutObjectParams): Promise<void>;
  /** 키가 없으면 null */
  getObject(key: string): Promise<string | null>;
  listObjects(prefix: string): Promise<ObjectSummary[]>;
}

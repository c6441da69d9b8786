import type { StoredArtifact } from '@workspace/artifact-store';
import type {
  ControlsResponse,
  OrganizationStatus,
  RiskFindingsResponse,
} from '@workspace/compliance-client';
import type { AnalysisResult, RiskLevel, SarDocument } from '../llm/resultSchema.js';

// =============================================================================
// Compliance verdict
// =============================================================================
export type ComplianceStatus = 'compliant' | 'needs_attention';

export interface LiveComplianceVerdict {
  compliance_score: number;
  status: ComplianceStatus;
  controls: ControlsResponse;
  risk_findings: RiskFindingsResponse;
  organization_status: OrganizationStatus;
  timestamp: string;
}

export interface BypassedComplianceVerdict {
  status: 'bypassed_in_debug';
}

export type ComplianceVerdict = LiveComplianceVerdict | BypassedComplianceVerdict;

// =============================================================================
// Orchestrator 결과
// =============================================================================
export type AuditOutcome =
  | { status: 'logged'; log_id: string; storage_path: string }
  | { status: 'failed'; error: string };

export type AnalysisResponse = AnalysisResult & {
  analysis_id: string;
  timestamp: string;
  compliance_status: string;
  report: StoredArtifact;
  audit: AuditOutcome;
};

export type TransactionAnalysis = AnalysisResult & { transaction_id: string };

/** 저장된 SAR: sar_id는 저장소가 발급한 ID, 모델 초안의 ID는 draft_sar_id */
export type PersistedSar = SarDocument & { draft_sar_id: string };

export interface ComprehensiveResult {
  analysis_id: string;
  customer_id: string;
  kyc_analysis: AnalysisResult;
  transaction_analyses: TransactionAnalysis[];
  sar_generated: boolean;
  sar_data: PersistedSar | null;
  sar_artifact: StoredArtifact | null;
  compliance_status: ComplianceVerdict;
  timestamp: string;
  overall_risk_level: RiskLevel;
  report: StoredArtifact;
  audit: AuditOutcome;
}

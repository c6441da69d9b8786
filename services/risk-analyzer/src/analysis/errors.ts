export type PipelineStage = 'compliance' | 'model' | 'persistence';

/**
 * 파이프라인 단계 실패 (부분 결과 없음)
 */
export class AnalysisPipelineError extends Error {
  stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`[${stage}] 분석 파이프라인 실패: ${reason}`, { cause });
    this.name = 'AnalysisPipelineError';
    this.stage = stage;
  }
}

/** COMPLIANCE_ENFORCEMENT=block 이고 판정이 needs_attention 일 때 */
export class ComplianceBlockedError extends Error {
  complianceScore: number;

  constructor(complianceScore: number) {
    super(`컴플라이언스 점수 미달로 분석 차단 (score=${complianceScore})`);
    this.name = 'ComplianceBlockedError';
    this.complianceScore = complianceScore;
  }
}

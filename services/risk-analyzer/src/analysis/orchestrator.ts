import { DateTime } from 'luxon';
import { compactDate, createLogger, toIsoString } from '@workspace/shared-utils';
import type {
  ArtifactKind,
  ArtifactPayload,
  PutArtifactOptions,
  StoredArtifact,
  StoredAuditEntry,
} from '@workspace/artifact-store';
import type { ComplianceGate } from '../compliance/gate.js';
import { buildKycPrompt, buildSarPrompt, buildTransactionPrompt } from '../llm/buildPrompt.js';
import type { ModelInvoker } from '../llm/invokeModel.js';
import { coerceAnalysis, coerceSar } from '../llm/parseResult.js';
import type { AnalysisResult, RiskLevel } from '../llm/resultSchema.js';
import type { ComplianceEnforcement } from '../config/env.js';
import type {
  AnalysisResponse,
  AuditOutcome,
  ComplianceVerdict,
  ComprehensiveResult,
  PersistedSar,
  TransactionAnalysis,
} from '../types/analysis.js';
import type { KycProfile, TransactionRecord } from '../types/requests.js';
import { AnalysisPipelineError, ComplianceBlockedError } from './errors.js';
import type { PipelineStage } from './errors.js';

const logger = createLogger('analysis-orchestrator');

/** 오케스트레이터가 쓰는 저장소 기능만 */
export interface AnalysisArtifactSink {
  put(
    kind: ArtifactKind,
    subjectId: string,
    payload: ArtifactPayload,
    options?: PutArtifactOptions,
  ): Promise<StoredArtifact>;
  appendAuditEntry(
    action: string,
    details: Record<string, unknown>,
    userId?: string,
  ): Promise<StoredAuditEntry>;
}

export type OrchestratorDeps = {
  gate: ComplianceGate;
  model: ModelInvoker;
  store: AnalysisArtifactSink;
  clock?: () => DateTime;
};

export type OrchestratorOptions = {
  complianceEnforcement?: ComplianceEnforcement;
  /** 종합 분석의 거래별 분석을 동시에 실행 (결과 순서는 입력 순서 유지) */
  parallelTransactions?: boolean;
  /** 감사 로그 user_id */
  userId?: string;
};

type AnalysisIdKind = 'KYC' | 'TXN' | 'COMP';

export function buildAnalysisId(kind: AnalysisIdKind, at: DateTime, subjectId: string): string {
  return `${kind}-${compactDate(at)}-${subjectId}`;
}

/**
 * SAR 에스컬레이션 조건: KYC HIGH 또는 거래 중 하나라도 HIGH
 */
export function shouldEscalate(kyc: AnalysisResult, transactions: AnalysisResult[]): boolean {
  return kyc.risk_level === 'HIGH' || transactions.some((t) => t.risk_level === 'HIGH');
}

/**
 * 종합 위험도: SAR 생성 → HIGH, 거래 중 MEDIUM 존재 → MEDIUM, 그 외 LOW
 */
export function overallRiskLevel(sarGenerated: boolean, transactions: AnalysisResult[]): RiskLevel {
  if (sarGenerated) return 'HIGH';
  if (transactions.some((t) => t.risk_level === 'MEDIUM')) return 'MEDIUM';
  return 'LOW';
}

/**
 * 분석 파이프라인
 *
 * gate → prompt → invoke → coerce → (SAR) → 리포트 저장 → 감사 로그
 *
 * - 모델/컴플라이언스/저장 실패는 AnalysisPipelineError(stage)로 중단 (부분 결과 없음)
 * - 감사 로그 실패만 예외: 결과는 반환하고 audit.status = 'failed'
 */
export class AnalysisOrchestrator {
  private readonly clock: () => DateTime;
  private readonly enforcement: ComplianceEnforcement;
  private readonly parallelTransactions: boolean;
  private readonly userId: string;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {},
  ) {
    this.clock = deps.clock ?? (() => DateTime.utc());
    this.enforcement = options.complianceEnforcement ?? 'report';
    this.parallelTransactions = options.parallelTransactions ?? false;
    this.userId = options.userId ?? 'system';
  }

  async runKyc(profile: KycProfile): Promise<AnalysisResponse> {
    const now = this.clock();
    const analysisId = buildAnalysisId('KYC', now, profile.customer_id);
    logger.info('KYC 분석 시작', { analysisId, customerId: profile.customer_id });

    const verdict = await this.checkCompliance();
    const result = await this.runStage('model', () => this.analyzeKyc(profile));

    const response = await this.finishSingle({
      kind: 'kyc_analysis',
      subjectId: profile.customer_id,
      analysisId,
      now,
      verdict,
      result,
      extra: {},
    });

    logger.info('KYC 분석 완료', { analysisId, riskLevel: result.risk_level });
    return response;
  }

  async runTransaction(txn: TransactionRecord): Promise<AnalysisResponse> {
    const now = this.clock();
    const analysisId = buildAnalysisId('TXN', now, txn.transaction_id);
    logger.info('거래 분석 시작', { analysisId, transactionId: txn.transaction_id });

    const verdict = await this.checkCompliance();
    const result = await this.runStage('model', () => this.analyzeTransaction(txn));

    const response = await this.finishSingle({
      kind: 'transaction_analysis',
      subjectId: txn.customer_id,
      analysisId,
      now,
      verdict,
      result,
      extra: { transaction_id: txn.transaction_id },
    });

    logger.info('거래 분석 완료', { analysisId, riskLevel: result.risk_level });
    return response;
  }

  async runComprehensive(
    kyc: KycProfile,
    transactions: readonly TransactionRecord[],
  ): Promise<ComprehensiveResult> {
    const now = this.clock();
    const customerId = kyc.customer_id;
    const analysisId = buildAnalysisId('COMP', now, customerId);
    logger.info('종합 분석 시작', { analysisId, transactionCount: transactions.length });

    const verdict = await this.checkCompliance();

    const kycAnalysis = await this.runStage('model', () => this.analyzeKyc(kyc));
    const transactionAnalyses = await this.runStage('model', () =>
      this.analyzeTransactions(transactions),
    );

    let sar: PersistedSar | null = null;
    let sarArtifact: StoredArtifact | null = null;

    if (shouldEscalate(kycAnalysis, transactionAnalyses)) {
      logger.warn('고위험 감지 → SAR 생성', { analysisId });

      const draft = await this.runStage('model', async () =>
        coerceSar(
          await this.deps.model.invoke(
            buildSarPrompt({
              kyc_analysis: kycAnalysis,
              transaction_analyses: transactionAnalyses,
              customer_id: customerId,
            }),
          ),
        ),
      );
      const stored = await this.runStage('persistence', () =>
        this.deps.store.put('sar', customerId, {
          ...draft,
          draft_sar_id: draft.sar_id,
          analysis_id: analysisId,
        }),
      );
      // 반환하는 SAR도 저장된 문서와 같은 ID (모델이 붙인 ID는 draft_sar_id)
      sar = { ...draft, sar_id: stored.artifact_id, draft_sar_id: draft.sar_id };
      sarArtifact = stored;
    }

    const overall = overallRiskLevel(sar !== null, transactionAnalyses);
    const timestamp = toIsoString(now);

    const body = {
      analysis_id: analysisId,
      customer_id: customerId,
      kyc_analysis: kycAnalysis,
      transaction_analyses: transactionAnalyses,
      sar_generated: sar !== null,
      sar_data: sar,
      sar_artifact: sarArtifact,
      compliance_status: verdict,
      timestamp,
      overall_risk_level: overall,
    };

    const report = await this.runStage('persistence', () =>
      this.deps.store.put('comprehensive_analysis', customerId, { ...body }),
    );

    const audit = await this.appendAudit('comprehensive_analysis', {
      analysis_id: analysisId,
      customer_id: customerId,
      report_id: report.artifact_id,
      transaction_count: transactions.length,
      sar_generated: sar !== null,
      sar_id: sarArtifact?.artifact_id ?? null,
      overall_risk_level: overall,
    });

    logger.info('종합 분석 완료', { analysisId, overall, sarGenerated: sar !== null });

    return { ...body, report, audit };
  }

  // ---------------------------------------------------------------------------
  // steps
  // ---------------------------------------------------------------------------

  private async checkCompliance(): Promise<ComplianceVerdict> {
    return this.runStage('compliance', async () => {
      const verdict = await this.deps.gate.checkPosture();

      if (verdict.status === 'needs_attention') {
        logger.warn('컴플라이언스 점수 미달', {
          score: verdict.compliance_score,
          enforcement: this.enforcement,
        });
        if (this.enforcement === 'block') {
          throw new ComplianceBlockedError(verdict.compliance_score);
        }
      }

      return verdict;
    });
  }

  private async analyzeKyc(profile: KycProfile): Promise<AnalysisResult> {
    const text = await this.deps.model.invoke(buildKycPrompt(profile));
    return coerceAnalysis(text, 'kyc');
  }

  private async analyzeTransaction(txn: TransactionRecord): Promise<AnalysisResult> {
    const text = await this.deps.model.invoke(buildTransactionPrompt(txn));
    return coerceAnalysis(text, 'transaction');
  }

  private async analyzeTransactions(
    transactions: readonly TransactionRecord[],
  ): Promise<TransactionAnalysis[]> {
    const analyzeOne = async (txn: TransactionRecord): Promise<TransactionAnalysis> => ({
      transaction_id: txn.transaction_id,
      ...(await this.analyzeTransaction(txn)),
    });

    if (this.parallelTransactions) {
      return Promise.all(transactions.map(analyzeOne));
    }

    const out: TransactionAnalysis[] = [];
    for (const txn of transactions) {
      out.push(await analyzeOne(txn));
    }
    return out;
  }

  private async finishSingle(params: {
    kind: 'kyc_analysis' | 'transaction_analysis';
    subjectId: string;
    analysisId: string;
    now: DateTime;
    verdict: ComplianceVerdict;
    result: AnalysisResult;
    extra: Record<string, string>;
  }): Promise<AnalysisResponse> {
    const { kind, subjectId, analysisId, now, verdict, result, extra } = params;
    const timestamp = toIsoString(now);

    const report = await this.runStage('persistence', () =>
      this.deps.store.put(kind, subjectId, {
        analysis_id: analysisId,
        ...extra,
        ...result,
        compliance_status: verdict.status,
        timestamp,
      }),
    );

    const audit = await this.appendAudit(kind, {
      analysis_id: analysisId,
      customer_id: subjectId,
      ...extra,
      report_id: report.artifact_id,
      risk_level: result.risk_level,
      risk_score: result.risk_score,
    });

    return {
      ...result,
      analysis_id: analysisId,
      timestamp,
      compliance_status: verdict.status,
      report,
      audit,
    };
  }

  private async appendAudit(action: string, details: Record<string, unknown>): Promise<AuditOutcome> {
    try {
      const logged = await this.deps.store.appendAuditEntry(action, details, this.userId);
      return { status: 'logged', log_id: logged.log_id, storage_path: logged.storage_path };
    } catch (error) {
      logger.error('감사 로그 기록 실패', { action, error });
      return { status: 'failed', error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async runStage<T>(stage: PipelineStage, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      logger.error('분석 파이프라인 단계 실패', { stage, error });
      throw new AnalysisPipelineError(stage, error);
    }
  }
}

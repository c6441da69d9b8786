import { DateTime } from 'luxon';
import { createLogger, toIsoString } from '@workspace/shared-utils';
import { ComplianceProviderUnavailableError } from '@workspace/compliance-client';
import type {
  ComplianceProvider,
  ControlsResponse,
  OrganizationStatus,
  RiskFindingsResponse,
} from '@workspace/compliance-client';
import type {
  BypassedComplianceVerdict,
  ComplianceVerdict,
  LiveComplianceVerdict,
} from '../types/analysis.js';

const logger = createLogger('compliance-gate');

export const COMPLIANT_THRESHOLD = 80;
const FINDING_PENALTY = 5;
const MAX_FINDING_PENALTY = 20;

export function countControls(controls: ControlsResponse): { total: number; passed: number } {
  return {
    total: controls.data.length,
    passed: controls.data.filter((c) => c.status === 'passed').length,
  };
}

/**
 * 점수 = trunc(max(0, passed/total*100 - min(findings*5, 20)))
 * 컨트롤이 하나도 없으면 0
 */
export function calculateComplianceScore(
  controls: ControlsResponse,
  findings: RiskFindingsResponse,
): number {
  const { total, passed } = countControls(controls);
  if (total === 0) return 0;

  const base = (passed * 100) / total;
  const penalty = Math.min(findings.data.length * FINDING_PENALTY, MAX_FINDING_PENALTY);
  return Math.trunc(Math.max(0, base - penalty));
}

export interface ComplianceGate {
  readonly mode: 'live' | 'bypass';
  checkPosture(): Promise<ComplianceVerdict>;
}

/**
 * provider에서 controls → risk findings → organization status 순서로 읽어 판정
 * 하나라도 실패하면 부분 판정 없이 ComplianceProviderUnavailableError
 */
export class LiveComplianceGate implements ComplianceGate {
  readonly mode = 'live';

  constructor(
    private readonly provider: ComplianceProvider,
    private readonly clock: () => DateTime = () => DateTime.utc(),
  ) {}

  async checkPosture(): Promise<LiveComplianceVerdict> {
    let controls: ControlsResponse;
    let findings: RiskFindingsResponse;
    let organization: OrganizationStatus;

    try {
      controls = await this.provider.getControls();
      findings = await this.provider.getRiskFindings();
      organization = await this.provider.getOrganizationStatus();
    } catch (error) {
      logger.error('컴플라이언스 상태 조회 실패', { error });
      if (error instanceof ComplianceProviderUnavailableError) throw error;
      throw new ComplianceProviderUnavailableError('compliance-posture', { cause: error });
    }

    const score = calculateComplianceScore(controls, findings);
    const verdict: LiveComplianceVerdict = {
      compliance_score: score,
      status: score >= COMPLIANT_THRESHOLD ? 'compliant' : 'needs_attention',
      controls,
      risk_findings: findings,
      organization_status: organization,
      timestamp: toIsoString(this.clock()),
    };

    logger.info('컴플라이언스 판정 완료', { score, status: verdict.status });
    return verdict;
  }
}

/** DEBUG 모드: provider를 호출하지 않고 sentinel 판정을 돌려준다 */
export class BypassingComplianceGate implements ComplianceGate {
  readonly mode = 'bypass';

  async checkPosture(): Promise<BypassedComplianceVerdict> {
    return { status: 'bypassed_in_debug' };
  }
}

export type ComplianceSummary = {
  compliance_score: number;
  status: LiveComplianceVerdict['status'];
  total_controls: number;
  passed_controls: number;
  risk_findings_count: number;
  organization_status: OrganizationStatus;
  last_updated: string;
};

export function summarizePosture(verdict: LiveComplianceVerdict): ComplianceSummary {
  const { total, passed } = countControls(verdict.controls);
  return {
    compliance_score: verdict.compliance_score,
    status: verdict.status,
    total_controls: total,
    passed_controls: passed,
    risk_findings_count: verdict.risk_findings.data.length,
    organization_status: verdict.organization_status,
    last_updated: verdict.timestamp,
  };
}

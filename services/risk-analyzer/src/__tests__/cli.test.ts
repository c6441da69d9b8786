import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ArtifactNotFoundError } from '@workspace/artifact-store';
import type { ArtifactStore } from '@workspace/artifact-store';
import { OAuthStateStore } from '@workspace/compliance-client';
import type { ComplianceProviderClient } from '@workspace/compliance-client';
import type { AnalysisOrchestrator } from '../analysis/orchestrator.js';
import { createProgram } from '../cli.js';
import type { CliIO } from '../cli.js';
import type { LiveComplianceGate } from '../compliance/gate.js';
import type { AnalysisResponse, ComprehensiveResult, LiveComplianceVerdict } from '../types/analysis.js';

const TIMESTAMP = '2025-03-04T14:30:00.000Z';

const VERDICT: LiveComplianceVerdict = {
  compliance_score: 65,
  status: 'needs_attention',
  controls: { data: [{ status: 'passed' }, { status: 'failed' }] },
  risk_findings: { data: [{ id: 'R-1' }] },
  organization_status: { name: 'Test Org' },
  timestamp: TIMESTAMP,
};

const KYC_RESPONSE: AnalysisResponse = {
  risk_level: 'LOW',
  risk_score: 10,
  risk_factors: [],
  recommendations: [],
  compliance_notes: [],
  analysis_summary: 'ok',
  analysis_id: 'KYC-20250304-C-1',
  timestamp: TIMESTAMP,
  compliance_status: 'compliant',
  report: { artifact_id: 'R-1', storage_path: 'reports/kyc_analysis/C-1/R-1.json', encrypted: false, created_at: TIMESTAMP },
  audit: { status: 'logged', log_id: 'AUDIT-1', storage_path: 'audit-logs/2025/03/04/AUDIT-1.json' },
};

function setup(files: Record<string, string> = {}) {
  const orchestrator = {
    runKyc: vi.fn<AnalysisOrchestrator['runKyc']>().mockResolvedValue(KYC_RESPONSE),
    runTransaction: vi.fn<AnalysisOrchestrator['runTransaction']>().mockResolvedValue(KYC_RESPONSE),
    runComprehensive: vi.fn<AnalysisOrchestrator['runComprehensive']>(),
  };
  const gate = { checkPosture: vi.fn<LiveComplianceGate['checkPosture']>().mockResolvedValue(VERDICT) };
  const client = {
    getEvidence: vi.fn<ComplianceProviderClient['getEvidence']>().mockResolvedValue({ items: 2 }),
    getAuthorizationUrl: vi.fn<ComplianceProviderClient['getAuthorizationUrl']>(
      (state) => `https://auth.test/authorize?state=${state}`,
    ),
    exchangeCodeForToken: vi.fn<ComplianceProviderClient['exchangeCodeForToken']>().mockResolvedValue({
      access_token: 'test-token',
      token_type: 'Bearer',
      expires_in: 3600,
    }),
  };
  const store = {
    get: vi.fn<ArtifactStore['get']>().mockResolvedValue({ sar_id: 'SAR-1' }),
    appendAuditEntry: vi.fn<ArtifactStore['appendAuditEntry']>().mockResolvedValue({
      log_id: 'AUDIT-9',
      storage_path: 'audit-logs/2025/03/04/AUDIT-9.json',
      status: 'logged',
      encrypted: false,
      timestamp: TIMESTAMP,
    }),
  };
  const io = {
    readFile: vi.fn<CliIO['readFile']>(async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    }),
    ask: vi.fn<CliIO['ask']>(),
    print: vi.fn<CliIO['print']>(),
  };
  const oauthStates = new OAuthStateStore();

  const program = createProgram({
    orchestrator: () => orchestrator,
    liveGate: () => gate,
    complianceClient: () => client,
    artifactStore: () => store,
    oauthStates,
    status: () => ({ service: 'compliance-copilot', status: 'operational' }),
    io,
  });

  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });

  return { run, orchestrator, gate, client, store, io, oauthStates };
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  process.exitCode = undefined;
});

// ─── analyze ──────────────────────────────────────────────────────────────────

describe('analyze', () => {
  it('kyc: 파일을 검증해 분석하고 결과를 출력한다', async () => {
    const { run, orchestrator, io } = setup({
      'kyc.json': JSON.stringify({ customer_id: 'C-1', dob: '1980-01-02' }),
    });

    await run('analyze', 'kyc', '--file', 'kyc.json');

    expect(orchestrator.runKyc).toHaveBeenCalledWith({
      customer_id: 'C-1',
      date_of_birth: '1980-01-02',
      pep_status: 'No',
      sanctions_check: 'Clear',
    });
    expect(io.print).toHaveBeenCalledWith(KYC_RESPONSE);
    expect(process.exitCode).toBeUndefined();
  });

  it('transaction: type alias를 정식 필드로 넘긴다', async () => {
    const { run, orchestrator } = setup({
      't.json': JSON.stringify({ transaction_id: 'T-1', customer_id: 'C-1', type: 'wire' }),
    });

    await run('analyze', 'transaction', '-f', 't.json');

    expect(orchestrator.runTransaction.mock.calls[0]?.[0]).toMatchObject({
      transaction_id: 'T-1',
      transaction_type: 'wire',
      currency: 'USD',
    });
  });

  it('comprehensive: kyc와 transactions를 나눠 넘긴다', async () => {
    const { run, orchestrator, io } = setup({
      'c.json': JSON.stringify({
        kyc: { customer_id: 'C-1' },
        transactions: [{ transaction_id: 'T-1', customer_id: 'C-1', amount: 10 }],
      }),
    });
    const result: ComprehensiveResult = {
      analysis_id: 'COMP-20250304-C-1',
      customer_id: 'C-1',
      kyc_analysis: KYC_RESPONSE,
      transaction_analyses: [],
      sar_generated: false,
      sar_data: null,
      sar_artifact: null,
      compliance_status: VERDICT,
      timestamp: TIMESTAMP,
      overall_risk_level: 'LOW',
      report: KYC_RESPONSE.report,
      audit: KYC_RESPONSE.audit,
    };
    orchestrator.runComprehensive.mockResolvedValue(result);

    await run('analyze', 'comprehensive', '--file', 'c.json');

    const [kyc, transactions] = orchestrator.runComprehensive.mock.calls[0] ?? [undefined, undefined];
    expect(kyc?.customer_id).toBe('C-1');
    expect(transactions?.map((t) => t.transaction_id)).toEqual(['T-1']);
    expect(io.print).toHaveBeenCalledWith(result);
  });

  it('잘못된 JSON이면 분석하지 않고 exit code 1', async () => {
    const { run, orchestrator, io } = setup({ 'bad.json': '{ not json' });

    await run('analyze', 'kyc', '--file', 'bad.json');

    expect(orchestrator.runKyc).not.toHaveBeenCalled();
    expect(io.print).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('필수 필드가 없으면 exit code 1', async () => {
    const { run, orchestrator } = setup({ 'k.json': JSON.stringify({ name: 'No Id' }) });

    await run('analyze', 'kyc', '--file', 'k.json');

    expect(orchestrator.runKyc).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('분석 실패도 exit code 1', async () => {
    const { run, orchestrator, io } = setup({ 'kyc.json': JSON.stringify({ customer_id: 'C-1' }) });
    orchestrator.runKyc.mockRejectedValue(new Error('model down'));

    await run('analyze', 'kyc', '--file', 'kyc.json');

    expect(io.print).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});

// ─── compliance ───────────────────────────────────────────────────────────────

describe('compliance', () => {
  it('posture: 판정을 그대로 출력', async () => {
    const { run, io } = setup();

    await run('compliance', 'posture');

    expect(io.print).toHaveBeenCalledWith(VERDICT);
  });

  it('summary: 요약 수치를 출력', async () => {
    const { run, io } = setup();

    await run('compliance', 'summary');

    expect(io.print).toHaveBeenCalledWith({
      compliance_score: 65,
      status: 'needs_attention',
      total_controls: 2,
      passed_controls: 1,
      risk_findings_count: 1,
      organization_status: { name: 'Test Org' },
      last_updated: TIMESTAMP,
    });
  });

  it('evidence: 컨트롤 ID와 함께 출력', async () => {
    const { run, io, client } = setup();

    await run('compliance', 'evidence', 'CTRL-7');

    expect(client.getEvidence).toHaveBeenCalledWith('CTRL-7');
    expect(io.print).toHaveBeenCalledWith({
      control_id: 'CTRL-7',
      data: { items: 2 },
      timestamp: expect.any(String),
    });
  });

  it('login: state를 검증하고 code를 토큰으로 교환한다', async () => {
    const { run, io, client, oauthStates } = setup();
    io.ask.mockImplementation(async (question) => {
      const state = /state=([\w-]+)/.exec(question)?.[1] ?? '';
      return `http://localhost:8000/auth/compliance/callback?code=code-1&state=${state}`;
    });

    await run('compliance', 'login');

    expect(client.exchangeCodeForToken).toHaveBeenCalledWith('code-1');
    expect(io.print).toHaveBeenCalledWith({
      status: 'success',
      access_token: 'test-token',
      token_type: 'Bearer',
      expires_in: 3600,
      scope: null,
      hint: 'COMPLIANCE_ACCESS_TOKEN 에 access_token 값을 설정하면 이후 명령에서 사용됩니다.',
    });
    expect(oauthStates.size).toBe(0);
  });

  it('login: 모르는 state면 토큰 교환 없이 실패', async () => {
    const { run, io, client } = setup();
    io.ask.mockResolvedValue('http://localhost:8000/auth/compliance/callback?code=code-1&state=forged');

    await run('compliance', 'login');

    expect(client.exchangeCodeForToken).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});

// ─── sar / audit / status ─────────────────────────────────────────────────────

describe('sar get', () => {
  it('고객 ID 경로에서 SAR을 읽는다', async () => {
    const { run, store, io } = setup();

    await run('sar', 'get', 'SAR-1', '--customer', 'C-1');

    expect(store.get).toHaveBeenCalledWith('sar', 'C-1', 'SAR-1');
    expect(io.print).toHaveBeenCalledWith({ sar_id: 'SAR-1' });
  });

  it('없으면 exit code 1', async () => {
    const { run, store, io } = setup();
    store.get.mockRejectedValue(new ArtifactNotFoundError('sars/C-1/SAR-404.json'));

    await run('sar', 'get', 'SAR-404', '-c', 'C-1');

    expect(io.print).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});

describe('audit log', () => {
  it('details JSON과 사용자를 넘긴다', async () => {
    const { run, store, io } = setup();

    await run('audit', 'log', '--action', 'manual_review', '--details', '{"case":"X-1"}', '--user', 'analyst-1');

    expect(store.appendAuditEntry).toHaveBeenCalledWith('manual_review', { case: 'X-1' }, 'analyst-1');
    expect(io.print).toHaveBeenCalledWith({
      log_id: 'AUDIT-9',
      storage_path: 'audit-logs/2025/03/04/AUDIT-9.json',
      status: 'logged',
      encrypted: false,
      timestamp: TIMESTAMP,
    });
  });

  it('기본값: details {} / user system', async () => {
    const { run, store } = setup();

    await run('audit', 'log', '-a', 'export');

    expect(store.appendAuditEntry).toHaveBeenCalledWith('export', {}, 'system');
  });

  it('details가 객체가 아니면 exit code 1', async () => {
    const { run, store } = setup();

    await run('audit', 'log', '-a', 'export', '-d', '[1,2]');

    expect(store.appendAuditEntry).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});

describe('status', () => {
  it('서비스 상태에 timestamp를 붙인다', async () => {
    const { run, io } = setup();

    await run('status');

    expect(io.print).toHaveBeenCalledWith({
      service: 'compliance-copilot',
      status: 'operational',
      timestamp: expect.any(String),
    });
  });
});

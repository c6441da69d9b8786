import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DateTime } from 'luxon';
import { ComplianceProviderUnavailableError } from '@workspace/compliance-client';
import type { ComplianceProvider } from '@workspace/compliance-client';
import {
  BypassingComplianceGate,
  LiveComplianceGate,
  calculateComplianceScore,
  summarizePosture,
} from '../compliance/gate.js';

const FIXED_NOW = DateTime.utc(2025, 3, 4, 9, 0);

function controls(passed: number, failed: number) {
  return {
    data: [
      ...Array.from({ length: passed }, (_, i) => ({ id: `P-${i}`, status: 'passed' })),
      ...Array.from({ length: failed }, (_, i) => ({ id: `F-${i}`, status: 'failed' })),
    ],
  };
}

function findings(count: number) {
  return { data: Array.from({ length: count }, (_, i) => ({ id: `R-${i}`, severity: 'medium' })) };
}

function makeProvider(passed: number, failed: number, findingCount: number) {
  return {
    getControls: vi.fn<ComplianceProvider['getControls']>().mockResolvedValue(controls(passed, failed)),
    getRiskFindings: vi
      .fn<ComplianceProvider['getRiskFindings']>()
      .mockResolvedValue(findings(findingCount)),
    getOrganizationStatus: vi
      .fn<ComplianceProvider['getOrganizationStatus']>()
      .mockResolvedValue({ name: 'Test Org' }),
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('calculateComplianceScore', () => {
  it.each([
    { passed: 8, failed: 2, findings: 3, expected: 65 },
    { passed: 9, failed: 1, findings: 2, expected: 80 },
    { passed: 5, failed: 0, findings: 0, expected: 100 },
    { passed: 1, failed: 2, findings: 0, expected: 33 },
    { passed: 1, failed: 2, findings: 10, expected: 13 },
    { passed: 0, failed: 4, findings: 2, expected: 0 },
  ])('passed=$passed failed=$failed findings=$findings → $expected', ({ passed, failed, findings: f, expected }) => {
    expect(calculateComplianceScore(controls(passed, failed), findings(f))).toBe(expected);
  });

  it('컨트롤이 없으면 0', () => {
    expect(calculateComplianceScore({ data: [] }, findings(0))).toBe(0);
  });
});

describe('LiveComplianceGate', () => {
  it('점수 65 → needs_attention', async () => {
    const gate = new LiveComplianceGate(makeProvider(8, 2, 3), () => FIXED_NOW);

    const verdict = await gate.checkPosture();

    expect(verdict.compliance_score).toBe(65);
    expect(verdict.status).toBe('needs_attention');
    expect(verdict.organization_status).toEqual({ name: 'Test Org' });
    expect(verdict.timestamp).toBe('2025-03-04T09:00:00.000Z');
  });

  it('점수 80 → compliant', async () => {
    const gate = new LiveComplianceGate(makeProvider(9, 1, 2), () => FIXED_NOW);
    await expect(gate.checkPosture()).resolves.toMatchObject({ compliance_score: 80, status: 'compliant' });
  });

  it('중간 조회가 실패하면 이후 조회 없이 ProviderUnavailable', async () => {
    const provider = makeProvider(8, 2, 0);
    const unavailable = new ComplianceProviderUnavailableError('/risks');
    provider.getRiskFindings.mockRejectedValue(unavailable);
    const gate = new LiveComplianceGate(provider);

    await expect(gate.checkPosture()).rejects.toBe(unavailable);
    expect(provider.getOrganizationStatus).not.toHaveBeenCalled();
  });

  it('그 밖의 오류도 ProviderUnavailable로 감싼다', async () => {
    const provider = makeProvider(8, 2, 0);
    const boom = new Error('boom');
    provider.getControls.mockRejectedValue(boom);
    const gate = new LiveComplianceGate(provider);

    const error = await gate.checkPosture().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ComplianceProviderUnavailableError);
    expect(error instanceof Error && error.cause).toBe(boom);
    expect(provider.getRiskFindings).not.toHaveBeenCalled();
  });
});

describe('BypassingComplianceGate', () => {
  it('provider 없이 sentinel 판정', async () => {
    const gate = new BypassingComplianceGate();
    expect(gate.mode).toBe('bypass');
    await expect(gate.checkPosture()).resolves.toEqual({ status: 'bypassed_in_debug' });
  });
});

describe('summarizePosture', () => {
  it('판정에서 요약 수치를 뽑는다', async () => {
    const verdict = await new LiveComplianceGate(makeProvider(8, 2, 3), () => FIXED_NOW).checkPosture();

    expect(summarizePosture(verdict)).toEqual({
      compliance_score: 65,
      status: 'needs_attention',
      total_controls: 10,
      passed_controls: 8,
      risk_findings_count: 3,
      organization_status: { name: 'Test Org' },
      last_updated: '2025-03-04T09:00:00.000Z',
    });
  });
});

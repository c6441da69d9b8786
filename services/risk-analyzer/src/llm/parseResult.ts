import { createLogger } from '@workspace/shared-utils';
import { validateAnalysisResult, validateSarDocument } from './resultSchema.js';
import type { AnalysisKind, AnalysisResult, SarDocument } from './resultSchema.js';

const logger = createLogger('response-coercer');

/** 모델 응답을 구조화할 수 없을 때 (coercer 내부에서만 사용) */
export class MalformedModelOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedModelOutputError';
  }
}

export function degradedAnalysis(): AnalysisResult {
  return {
    risk_level: 'MEDIUM',
    risk_score: 50,
    risk_factors: ['Unable to parse analysis'],
    recommendations: ['Manual review required'],
    compliance_notes: ['Analysis parsing failed'],
    analysis_summary: 'Error in analysis processing',
  };
}

export function degradedSar(): SarDocument {
  return {
    sar_id: 'SAR-ERROR-001',
    executive_summary: 'Error generating SAR',
    subject_information: {},
    suspicious_activity: { description: '', timeframe: '', amount: '' },
    supporting_evidence: [],
    risk_assessment: 'Unable to assess',
    recommendations: ['Manual review required'],
    filing_instructions: 'Contact compliance team',
  };
}

/**
 * 첫 '{' 부터 마지막 '}' 까지 잘라 JSON 객체로 파싱
 * (모델이 앞뒤에 설명 문장이나 ```json 펜스를 붙여도 통과)
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end < start) {
    throw new MalformedModelOutputError('응답에 JSON 객체가 없습니다.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new MalformedModelOutputError('응답 JSON 파싱 실패', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedModelOutputError('응답 JSON이 객체가 아닙니다.');
  }

  return { ...parsed };
}

function coerce<T>(text: string, label: string, build: (raw: Record<string, unknown>) => T, fallback: () => T): T {
  try {
    return build(extractJsonObject(text));
  } catch (error) {
    logger.warn(`${label} 응답 coercion 실패 → degraded 결과 사용`, {
      reason: error instanceof Error ? error.message : String(error),
      preview: text.slice(0, 200),
    });
    return fallback();
  }
}

/**
 * 모델 응답 → AnalysisResult
 * 절대 throw 하지 않는다. 실패 시 degradedAnalysis()의 새 사본을 돌려준다.
 */
export function coerceAnalysis(text: string, kind: AnalysisKind): AnalysisResult {
  return coerce(text, kind, (raw) => validateAnalysisResult(raw, kind), degradedAnalysis);
}

export function coerceSar(text: string): SarDocument {
  return coerce(text, 'sar', validateSarDocument, degradedSar);
}

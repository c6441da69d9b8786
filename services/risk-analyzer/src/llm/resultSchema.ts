import { z } from 'zod';

export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export const RiskLevelSchema = z.enum(RISK_LEVELS);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export type AnalysisKind = 'kyc' | 'transaction';

const LEVEL_ALIAS_MAP: Record<string, RiskLevel> = {
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  MED: 'MEDIUM',
  MODERATE: 'MEDIUM',
  HIGH: 'HIGH',
};

function normalizeLevel(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toUpperCase();
  return LEVEL_ALIAS_MAP[normalized] ?? normalized;
}

// "72" → 72, 71.6 → 72
function normalizeScore(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value.trim());
    return Number.isFinite(num) ? Math.round(num) : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return Math.round(value);
  return value;
}

function normalizeList(value: unknown): unknown {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'number' ? String(item) : item));
  }
  return value;
}

function normalizeText(value: unknown): unknown {
  if (value === undefined || value === null) return '';
  if (typeof value === 'number') return String(value);
  return value;
}

const StringListSchema = z.preprocess(normalizeList, z.array(z.string()));
const TextSchema = z.preprocess(normalizeText, z.string());

// =============================================================================
// 분석 결과
// =============================================================================
export const AnalysisResultSchema = z.object({
  risk_level: z.preprocess(normalizeLevel, RiskLevelSchema),
  risk_score: z.preprocess(normalizeScore, z.number().int().min(0).max(100)),
  risk_factors: StringListSchema,
  recommendations: StringListSchema,
  compliance_notes: StringListSchema,
  analysis_summary: TextSchema,
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

/**
 * 거래 분석 응답은 suspicion 계열 필드명을 쓴다.
 * kind에 맞는 이름을 우선하고, 없으면 다른 쪽 이름을 받아준다.
 */
const FIELD_VOCABULARY: Record<keyof Omit<AnalysisResult, 'recommendations' | 'analysis_summary'>, string> = {
  risk_level: 'suspicion_level',
  risk_score: 'suspicion_score',
  risk_factors: 'red_flags',
  compliance_notes: 'aml_concerns',
};

export function canonicalizeReply(raw: Record<string, unknown>, kind: AnalysisKind): Record<string, unknown> {
  const out: Record<string, unknown> = {
    recommendations: raw.recommendations,
    analysis_summary: raw.analysis_summary,
  };

  for (const [field, suspicionField] of Object.entries(FIELD_VOCABULARY)) {
    const preferred = kind === 'transaction' ? raw[suspicionField] : raw[field];
    const fallback = kind === 'transaction' ? raw[field] : raw[suspicionField];
    out[field] = preferred ?? fallback;
  }

  return out;
}

export function validateAnalysisResult(raw: Record<string, unknown>, kind: AnalysisKind): AnalysisResult {
  const parsed = AnalysisResultSchema.parse(canonicalizeReply(raw, kind));

  return {
    ...parsed,
    analysis_summary: parsed.analysis_summary.trim(),
    risk_factors: parsed.risk_factors.map((x) => x.trim()).filter(Boolean),
    recommendations: parsed.recommendations.map((x) => x.trim()).filter(Boolean),
    compliance_notes: parsed.compliance_notes.map((x) => x.trim()).filter(Boolean),
  };
}

// =============================================================================
// SAR
// =============================================================================
export const DRAFT_SAR_ID = 'SAR-DRAFT';

export const SarDocumentSchema = z.object({
  sar_id: z.preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? v.trim() : DRAFT_SAR_ID), z.string()),
  executive_summary: z.string().min(1),
  subject_information: z.preprocess((v) => v ?? {}, z.record(z.string(), z.unknown())),
  suspicious_activity: z.preprocess(
    (v) => v ?? {},
    z.object({
      description: TextSchema,
      timeframe: TextSchema,
      amount: TextSchema,
    }),
  ),
  supporting_evidence: StringListSchema,
  risk_assessment: TextSchema,
  recommendations: StringListSchema,
  filing_instructions: TextSchema,
});

export type SarDocument = z.infer<typeof SarDocumentSchema>;

export function validateSarDocument(raw: Record<string, unknown>): SarDocument {
  return SarDocumentSchema.parse(raw);
}

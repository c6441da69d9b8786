import '@workspace/shared-utils/env-loader';
import { envBoolean, envEnum, envNumber, env as readEnv } from '@workspace/shared-utils';

export const LLM_PROVIDERS = ['bedrock', 'openai'] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

// report: 점수 미달을 결과에 표시만 / block: 분석 중단
export const COMPLIANCE_ENFORCEMENTS = ['report', 'block'] as const;
export type ComplianceEnforcement = (typeof COMPLIANCE_ENFORCEMENTS)[number];

export const env = {
  /** ===============================
   * 서비스
   * =============================== */
  SERVICE_NAME: readEnv('SERVICE_NAME') ?? 'compliance-copilot',
  // true면 컴플라이언스 게이트를 우회 (BypassingComplianceGate)
  DEBUG: envBoolean('DEBUG', false),
  COMPLIANCE_ENFORCEMENT: envEnum('COMPLIANCE_ENFORCEMENT', COMPLIANCE_ENFORCEMENTS, 'report'),
  PARALLEL_TRANSACTION_ANALYSIS: envBoolean('PARALLEL_TRANSACTION_ANALYSIS', false),

  /** ===============================
   * LLM 설정
   * =============================== */
  LLM_PROVIDER: envEnum('LLM_PROVIDER', LLM_PROVIDERS, 'bedrock'),
  BEDROCK_MODEL_ID:
    readEnv('BEDROCK_MODEL_ID') ?? 'us.anthropic.claude-sonnet-4-20250514-v1:0',
  OPENAI_MODEL: readEnv('OPENAI_MODEL') ?? 'gpt-4o-mini',
  LLM_MAX_TOKENS: envNumber('LLM_MAX_TOKENS', 4000),
  LLM_TEMPERATURE: envNumber('LLM_TEMPERATURE', 0.1),
  LLM_TIMEOUT_MS: envNumber('LLM_TIMEOUT_MS', 30_000),

  /** ===============================
   * AWS / 아티팩트 저장소
   * =============================== */
  AWS_REGION: readEnv('AWS_REGION') ?? 'us-east-1',
  S3_BUCKET_NAME: readEnv('S3_BUCKET_NAME') ?? 'compliance-copilot-reports',
  KMS_KEY_ID: readEnv('KMS_KEY_ID'),
  S3_TIMEOUT_MS: envNumber('S3_TIMEOUT_MS', 30_000),

  /** ===============================
   * 컴플라이언스 provider
   * =============================== */
  COMPLIANCE_API_BASE_URL: readEnv('COMPLIANCE_API_BASE_URL') ?? 'https://api.vanta.com/v1',
  COMPLIANCE_AUTHORIZE_URL:
    readEnv('COMPLIANCE_AUTHORIZE_URL') ?? 'https://app.vanta.com/oauth/authorize',
  COMPLIANCE_TOKEN_URL: readEnv('COMPLIANCE_TOKEN_URL') ?? 'https://app.vanta.com/oauth/token',
  COMPLIANCE_CLIENT_ID: readEnv('COMPLIANCE_CLIENT_ID'),
  COMPLIANCE_CLIENT_SECRET: readEnv('COMPLIANCE_CLIENT_SECRET'),
  COMPLIANCE_REDIRECT_URI:
    readEnv('COMPLIANCE_REDIRECT_URI') ?? 'http://localhost:8000/auth/compliance/callback',
  COMPLIANCE_ACCESS_TOKEN: readEnv('COMPLIANCE_ACCESS_TOKEN'),
  COMPLIANCE_TIMEOUT_MS: envNumber('COMPLIANCE_TIMEOUT_MS', 30_000),
} as const;

export type Env = typeof env;

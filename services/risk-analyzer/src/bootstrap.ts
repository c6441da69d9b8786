import { requireEnv } from '@workspace/shared-utils';
import { ArtifactStore, S3ObjectStore, getS3Client } from '@workspace/artifact-store';
import { ComplianceProviderClient } from '@workspace/compliance-client';
import { env } from './config/env.js';
import { AnalysisOrchestrator } from './analysis/orchestrator.js';
import { BypassingComplianceGate, LiveComplianceGate } from './compliance/gate.js';
import type { ComplianceGate } from './compliance/gate.js';
import {
  BedrockModelInvoker,
  OpenAIModelInvoker,
  bedrockTransport,
  createBedrockClient,
  createOpenAIClient,
  openAITransport,
} from './llm/invokeModel.js';
import type { ModelInvoker } from './llm/invokeModel.js';

/**
 * env 기반 조립. 각 factory는 필요한 시크릿만 그때 요구한다.
 */

let complianceClient: ComplianceProviderClient | null = null;

export function getComplianceClient(): ComplianceProviderClient {
  if (!complianceClient) {
    complianceClient = new ComplianceProviderClient({
      baseUrl: env.COMPLIANCE_API_BASE_URL,
      authorizeUrl: env.COMPLIANCE_AUTHORIZE_URL,
      tokenUrl: env.COMPLIANCE_TOKEN_URL,
      clientId: env.COMPLIANCE_CLIENT_ID,
      clientSecret: env.COMPLIANCE_CLIENT_SECRET,
      redirectUri: env.COMPLIANCE_REDIRECT_URI,
      accessToken: env.COMPLIANCE_ACCESS_TOKEN,
      timeoutMs: env.COMPLIANCE_TIMEOUT_MS,
    });
  }
  return complianceClient;
}

export function createLiveGate(): LiveComplianceGate {
  return new LiveComplianceGate(getComplianceClient());
}

export function createComplianceGate(): ComplianceGate {
  return env.DEBUG ? new BypassingComplianceGate() : createLiveGate();
}

export function createModelInvoker(): ModelInvoker {
  const base = {
    maxTokens: env.LLM_MAX_TOKENS,
    temperature: env.LLM_TEMPERATURE,
    timeoutMs: env.LLM_TIMEOUT_MS,
  };

  if (env.LLM_PROVIDER === 'openai') {
    const client = createOpenAIClient(requireEnv('OPENAI_API_KEY'), env.LLM_TIMEOUT_MS);
    return new OpenAIModelInvoker({ ...base, modelId: env.OPENAI_MODEL }, openAITransport(client));
  }

  const client = createBedrockClient(env.AWS_REGION, env.LLM_TIMEOUT_MS);
  return new BedrockModelInvoker({ ...base, modelId: env.BEDROCK_MODEL_ID }, bedrockTransport(client));
}

export function createArtifactStore(): ArtifactStore {
  const s3 = getS3Client({ region: env.AWS_REGION, requestTimeoutMs: env.S3_TIMEOUT_MS });
  return new ArtifactStore(new S3ObjectStore(s3, env.S3_BUCKET_NAME), {
    kmsKeyId: env.KMS_KEY_ID,
    serviceName: env.SERVICE_NAME,
  });
}

export function createOrchestrator(): AnalysisOrchestrator {
  return new AnalysisOrchestrator(
    {
      gate: createComplianceGate(),
      model: createModelInvoker(),
      store: createArtifactStore(),
    },
    {
      complianceEnforcement: env.COMPLIANCE_ENFORCEMENT,
      parallelTransactions: env.PARALLEL_TRANSACTION_ANALYSIS,
    },
  );
}

export function serviceStatus(): Record<string, unknown> {
  return {
    service: env.SERVICE_NAME,
    status: 'operational',
    provider: env.LLM_PROVIDER,
    model: env.LLM_PROVIDER === 'openai' ? env.OPENAI_MODEL : env.BEDROCK_MODEL_ID,
    compliance_gate: env.DEBUG ? 'bypass' : 'live',
    compliance_enforcement: env.COMPLIANCE_ENFORCEMENT,
  };
}

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import type { InvokeModelCommandInput } from '@aws-sdk/client-bedrock-runtime';
import OpenAI from 'openai';
import { z } from 'zod';
import { createLogger } from '@workspace/shared-utils';

const logger = createLogger('model-invoker');

export type ModelInvokerConfig = {
  modelId: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

/**
 * 프롬프트 1건 → 모델 응답 텍스트
 * 재시도하지 않는다. 호출 실패/타임아웃/읽을 수 없는 응답 envelope은 ModelUnavailableError.
 * 텍스트가 비어있는 응답은 그대로('') 돌려주고 판단은 coercer에 맡긴다.
 */
export interface ModelInvoker {
  readonly provider: string;
  readonly modelId: string;
  invoke(prompt: string): Promise<string>;
}

export class ModelUnavailableError extends Error {
  provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`[${provider}] ${message}`, options);
    this.name = 'ModelUnavailableError';
    this.provider = provider;
  }
}

function failureReason(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'TimeoutError'
      ? `타임아웃 (${error.message})`
      : error.message;
  }
  return String(error);
}

// =============================================================================
// Bedrock (Anthropic messages)
// =============================================================================
const BedrockReplySchema = z
  .object({
    content: z
      .array(z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough())
      .default([]),
  })
  .passthrough();

export type BedrockTransport = (
  input: InvokeModelCommandInput,
  signal: AbortSignal,
) => Promise<{ body?: Uint8Array }>;

export function bedrockTransport(client: BedrockRuntimeClient): BedrockTransport {
  return (input, signal) => client.send(new InvokeModelCommand(input), { abortSignal: signal });
}

export function createBedrockClient(region: string, timeoutMs: number): BedrockRuntimeClient {
  return new BedrockRuntimeClient({
    region,
    maxAttempts: 1,
    requestHandler: { requestTimeout: timeoutMs },
  });
}

export class BedrockModelInvoker implements ModelInvoker {
  readonly provider = 'bedrock';

  constructor(
    private readonly config: ModelInvokerConfig,
    private readonly send: BedrockTransport,
  ) {}

  get modelId(): string {
    return this.config.modelId;
  }

  async invoke(prompt: string): Promise<string> {
    const payload = {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
    };

    let body: Uint8Array | undefined;
    try {
      const res = await this.send(
        {
          modelId: this.config.modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: new TextEncoder().encode(JSON.stringify(payload)),
        },
        AbortSignal.timeout(this.config.timeoutMs),
      );
      body = res.body;
    } catch (error) {
      logger.error('Bedrock 호출 실패', { modelId: this.config.modelId, error });
      throw new ModelUnavailableError(this.provider, `모델 호출 실패: ${failureReason(error)}`, { cause: error });
    }

    const text = extractBedrockText(body);
    if (text === null) {
      logger.error('Bedrock 응답 형식 오류', { modelId: this.config.modelId });
      throw new ModelUnavailableError(this.provider, '모델 응답 형식을 읽을 수 없습니다.');
    }

    if (!text) logger.warn('Bedrock 응답 텍스트가 비어있습니다.', { modelId: this.config.modelId });
    return text;
  }
}

/**
 * text 블록을 이어붙인다 (구분자 없음: 블록 경계가 JSON 문자열 중간일 수 있다)
 * 본문이 없거나 JSON이 아니거나 text 블록이 하나도 없으면 null
 */
function extractBedrockText(body: Uint8Array | undefined): string | null {
  if (!body || body.length === 0) return null;

  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder('utf-8').decode(body));
  } catch (error) {
    logger.debug('Bedrock 응답 본문 JSON 파싱 실패', { error });
    return null;
  }

  const parsed = BedrockReplySchema.safeParse(json);
  if (!parsed.success) return null;

  const blocks = parsed.data.content.filter(
    (block) => (block.type === undefined || block.type === 'text') && typeof block.text === 'string',
  );
  if (blocks.length === 0) return null;

  return blocks
    .map((block) => block.text ?? '')
    .join('')
    .trim();
}

// =============================================================================
// OpenAI (chat completions)
// =============================================================================
export type OpenAITransport = (
  body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  signal: AbortSignal,
) => Promise<{ choices: Array<{ message: { content: string | null } }> }>;

export function openAITransport(client: OpenAI): OpenAITransport {
  return (body, signal) => client.chat.completions.create(body, { signal });
}

export function createOpenAIClient(apiKey: string, timeoutMs: number): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
}

export class OpenAIModelInvoker implements ModelInvoker {
  readonly provider = 'openai';

  constructor(
    private readonly config: ModelInvokerConfig,
    private readonly create: OpenAITransport,
  ) {}

  get modelId(): string {
    return this.config.modelId;
  }

  async invoke(prompt: string): Promise<string> {
    let choice: { message: { content: string | null } } | undefined;
    try {
      const response = await this.create(
        {
          model: this.config.modelId,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        AbortSignal.timeout(this.config.timeoutMs),
      );
      choice = response.choices[0];
    } catch (error) {
      logger.error('OpenAI 호출 실패', { model: this.config.modelId, error });
      throw new ModelUnavailableError(this.provider, `모델 호출 실패: ${failureReason(error)}`, { cause: error });
    }

    if (!choice) {
      logger.error('OpenAI 응답에 choice가 없습니다.', { model: this.config.modelId });
      throw new ModelUnavailableError(this.provider, '모델 응답 형식을 읽을 수 없습니다.');
    }

    const text = choice.message.content ?? '';
    if (!text.trim()) logger.warn('OpenAI 응답 텍스트가 비어있습니다.', { model: this.config.modelId });
    return text;
  }
}

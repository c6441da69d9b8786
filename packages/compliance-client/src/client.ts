import { createLogger } from '@workspace/shared-utils';
import type { z } from 'zod';
import { ComplianceAuthError, ComplianceProviderUnavailableError } from './errors.js';
import {
  ControlsResponseSchema,
  EvidenceResponseSchema,
  OrganizationStatusSchema,
  RiskFindingsResponseSchema,
  TokenResponseSchema,
} from './types.js';
import type {
  ComplianceClientConfig,
  ComplianceProvider,
  ControlsResponse,
  EvidenceResponse,
  OrganizationStatus,
  RiskFindingsResponse,
  TokenResponse,
} from './types.js';

const logger = createLogger('compliance-client');

export const OAUTH_SCOPE = 'read:controls read:risks read:evidence read:organization';

/**
 * 컴플라이언스 provider REST 클라이언트
 *
 * - 조회는 Bearer 토큰 필요 (config.accessToken 또는 exchangeCodeForToken 이후)
 * - 모든 요청은 timeoutMs 안에 끝나지 않으면 중단
 */
export class ComplianceProviderClient implements ComplianceProvider {
  private accessToken: string | null;
  private tokenType = 'Bearer';

  constructor(private readonly config: ComplianceClientConfig) {
    this.accessToken = config.accessToken ?? null;
  }

  get hasAccessToken(): boolean {
    return this.accessToken !== null;
  }

  setAccessToken(accessToken: string, tokenType = 'Bearer'): void {
    this.accessToken = accessToken;
    this.tokenType = tokenType;
  }

  /**
   * OAuth authorize URL 생성
   */
  getAuthorizationUrl(state: string): string {
    const url = new URL(this.config.authorizeUrl);
    url.searchParams.set('client_id', this.requireConfig('clientId'));
    url.searchParams.set('redirect_uri', this.requireConfig('redirectUri'));
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', OAUTH_SCOPE);
    url.searchParams.set('state', state);
    return url.toString();
  }

  /**
   * authorization code → access token 교환
   * 성공 시 이후 조회에 사용할 토큰을 보관한다.
   */
  async exchangeCodeForToken(code: string): Promise<TokenResponse> {
    const clientId = this.requireConfig('clientId');
    const clientSecret = this.requireConfig('clientSecret');
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    let res: Response;
    try {
      res = await fetch(this.config.tokenUrl, {
        method: 'POST',
        headers: {
          authorization: `Basic ${credentials}`,
          'content-type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          grant_type: 'authorization_code',
          code,
          redirect_uri: this.requireConfig('redirectUri'),
        }).toString(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      logger.error('토큰 교환 요청 실패', { error });
      throw new ComplianceProviderUnavailableError(this.config.tokenUrl, { cause: error });
    }

    if (!res.ok) {
      const text = await res.text();
      logger.error('토큰 교환 실패', { status: res.status, body: text });
      throw new ComplianceAuthError(`토큰 교환 실패: ${res.status}`, res.status, text);
    }

    const body: unknown = await res.json().catch(() => null);
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error('토큰 응답 형식 오류', { issues: parsed.error.issues });
      throw new ComplianceAuthError('토큰 응답에 access_token 없음', res.status);
    }

    this.setAccessToken(parsed.data.access_token, parsed.data.token_type);
    logger.info('provider access token 발급 완료', {
      tokenType: parsed.data.token_type,
      expiresIn: parsed.data.expires_in ?? null,
    });

    return parsed.data;
  }

  async getControls(): Promise<ControlsResponse> {
    return this.fetchProvider('/controls', ControlsResponseSchema);
  }

  async getRiskFindings(): Promise<RiskFindingsResponse> {
    return this.fetchProvider('/risk-findings', RiskFindingsResponseSchema);
  }

  async getOrganizationStatus(): Promise<OrganizationStatus> {
    return this.fetchProvider('/organization/status', OrganizationStatusSchema);
  }

  async getEvidence(controlId: string): Promise<EvidenceResponse> {
    return this.fetchProvider(
      `/controls/${encodeURIComponent(controlId)}/evidence`,
      EvidenceResponseSchema,
    );
  }

  private async fetchProvider<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    if (!this.accessToken) {
      throw new ComplianceAuthError('access token 없음. 먼저 login 필요');
    }

    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${endpoint}`;

    try {
      const res = await fetch(url, {
        headers: {
          authorization: `${this.tokenType} ${this.accessToken}`,
          'content-type': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!res.ok) {
        throw new Error(`provider 요청 실패: ${res.status} ${res.statusText}`);
      }

      const data = schema.parse(await res.json());
      logger.debug('provider 조회 완료', { endpoint });
      return data;
    } catch (error) {
      logger.error('provider 조회 실패', { endpoint, error });
      throw new ComplianceProviderUnavailableError(endpoint, { cause: error });
    }
  }

  private requireConfig(key: 'clientId' | 'clientSecret' | 'redirectUri'): string {
    const value = this.config[key];
    if (!value) {
      throw new ComplianceAuthError(`OAuth 설정 누락: ${key}`);
    }
    return value;
  }
}

/**
 * 붙여넣은 redirect URL에서 code/state 추출
 */
export function parseAuthorizationCallback(callbackUrl: string): { code: string; state: string } {
  let url: URL;
  try {
    url = new URL(callbackUrl.trim());
  } catch (error) {
    throw new ComplianceAuthError(`callback URL 형식 오류: ${String(error)}`);
  }

  const denied = url.searchParams.get('error');
  if (denied) {
    throw new ComplianceAuthError(`authorization 거부: ${denied}`);
  }

  const code = url.searchParams.get('code');
  const state = url.searchParams.get('state');
  if (!code || !state) {
    throw new ComplianceAuthError('callback URL에 code/state 없음');
  }

  return { code, state };
}

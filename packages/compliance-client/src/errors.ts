/**
 * 컴플라이언스 provider 관련 에러 클래스
 */

export class ComplianceProviderUnavailableError extends Error {
  endpoint: string;

  constructor(endpoint: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`[compliance-client] provider 조회 실패 (${endpoint})${reason}`, options);
    this.name = 'ComplianceProviderUnavailableError';
    this.endpoint = endpoint;
  }
}

export class ComplianceAuthError extends Error {
  status: number | null;
  bodyText: string;

  constructor(message: string, status: number | null = null, bodyText = '') {
    super(`[compliance-client] ${message}`);
    this.name = 'ComplianceAuthError';
    this.status = status;
    this.bodyText = bodyText;
  }
}

export type OAuthStateFailure = 'unknown' | 'expired';

export class OAuthStateError extends Error {
  reason: OAuthStateFailure;

  constructor(reason: OAuthStateFailure) {
    super(
      reason === 'expired'
        ? '[compliance-client] OAuth state 만료'
        : '[compliance-client] 알 수 없는 OAuth state',
    );
    this.name = 'OAuthStateError';
    this.reason = reason;
  }
}

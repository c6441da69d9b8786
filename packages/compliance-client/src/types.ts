import { z } from 'zod';

// =============================================================================
// Provider 응답 스키마 (알 수 없는 필드는 그대로 통과)
// =============================================================================
export const ControlSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export const ControlsResponseSchema = z
  .object({
    data: z.array(ControlSchema).default([]),
  })
  .passthrough();

export const RiskFindingSchema = z
  .object({
    id: z.string().optional(),
    severity: z.string().optional(),
  })
  .passthrough();

export const RiskFindingsResponseSchema = z
  .object({
    data: z.array(RiskFindingSchema).default([]),
  })
  .passthrough();

export const OrganizationStatusSchema = z.record(z.string(), z.unknown());

export const EvidenceResponseSchema = z.record(z.string(), z.unknown());

export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().default('Bearer'),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type Control = z.infer<typeof ControlSchema>;
export type ControlsResponse = z.infer<typeof ControlsResponseSchema>;
export type RiskFinding = z.infer<typeof RiskFindingSchema>;
export type RiskFindingsResponse = z.infer<typeof RiskFindingsResponseSchema>;
export type OrganizationStatus = z.infer<typeof OrganizationStatusSchema>;
export type EvidenceResponse = z.infer<typeof EvidenceResponseSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// =============================================================================
// Client 설정
// =============================================================================
export interface ComplianceClientConfig {
  baseUrl: string;
  authorizeUrl: string;
  tokenUrl: string;
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  /** 미리 발급받은 토큰 (login 없이 바로 조회) */
  accessToken?: string;
  timeoutMs: number;
}

/** 게이트가 쓰는 읽기 전용 provider 포트 */
export interface ComplianceProvider {
  getControls(): Promise<ControlsResponse>;
  getRiskFindings(): Promise<RiskFindingsResponse>;
  getOrganizationStatus(): Promise<OrganizationStatus>;
}

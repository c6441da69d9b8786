import { Command } from 'commander';
import { z } from 'zod';
import { createLogger, nowIso } from '@workspace/shared-utils';
import { ArtifactNotFoundError } from '@workspace/artifact-store';
import type { ArtifactStore } from '@workspace/artifact-store';
import { parseAuthorizationCallback } from '@workspace/compliance-client';
import type { ComplianceProviderClient, OAuthStateStore } from '@workspace/compliance-client';
import type { AnalysisOrchestrator } from './analysis/orchestrator.js';
import { summarizePosture } from './compliance/gate.js';
import type { LiveComplianceGate } from './compliance/gate.js';
import {
  ComprehensiveRequestSchema,
  KycProfileSchema,
  TransactionRecordSchema,
} from './types/requests.js';

const logger = createLogger('risk-analyzer-cli');

export type CliIO = {
  readFile(path: string): Promise<string>;
  /** 한 줄 입력 (login 콜백 URL 붙여넣기) */
  ask(question: string): Promise<string>;
  print(value: unknown): void;
};

/**
 * CLI가 쓰는 협력 객체. 모두 lazy factory라 명령에 필요한 설정만 요구된다.
 */
export type CliContext = {
  orchestrator(): Pick<AnalysisOrchestrator, 'runKyc' | 'runTransaction' | 'runComprehensive'>;
  liveGate(): Pick<LiveComplianceGate, 'checkPosture'>;
  complianceClient(): Pick<
    ComplianceProviderClient,
    'getEvidence' | 'getAuthorizationUrl' | 'exchangeCodeForToken'
  >;
  artifactStore(): Pick<ArtifactStore, 'get' | 'appendAuditEntry'>;
  oauthStates: Pick<OAuthStateStore, 'issue' | 'consume'>;
  status(): Record<string, unknown>;
  io: CliIO;
};

const FileOptionSchema = z.object({ file: z.string().min(1) });
const SarOptionSchema = z.object({ customer: z.string().min(1) });
const AuditOptionSchema = z.object({
  action: z.string().min(1),
  details: z.string().default('{}'),
  user: z.string().min(1).default('system'),
});
const AuditDetailsSchema = z.record(z.string(), z.unknown());

async function readJsonFile(io: CliIO, path: string): Promise<unknown> {
  const text = await io.readFile(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`JSON 파일 파싱 실패: ${path}`, { cause: error });
  }
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  /**
   * 공통 action 래퍼: 결과는 JSON으로 출력, 실패는 로그 후 exit code 1
   */
  const action =
    <A extends unknown[]>(label: string, run: (...args: A) => Promise<unknown>) =>
    async (...args: A): Promise<void> => {
      try {
        ctx.io.print(await run(...args));
      } catch (error) {
        logger.error(`${label} 실패`, { error });
        process.exitCode = 1;
      }
    };

  program
    .name('risk-analyzer')
    .description('KYC/AML 컴플라이언스 분석 CLI')
    .version('0.1.0');

  // ─── analyze ──────────────────────────────────────────────────────────────
  const analyze = program.command('analyze').description('LLM 기반 위험 분석');

  analyze
    .command('kyc')
    .description('KYC 프로필 분석')
    .requiredOption('-f, --file <path>', 'KYC 프로필 JSON 파일')
    .action(
      action('KYC 분석', async (options: unknown) => {
        const { file } = FileOptionSchema.parse(options);
        const profile = KycProfileSchema.parse(await readJsonFile(ctx.io, file));
        return ctx.orchestrator().runKyc(profile);
      }),
    );

  analyze
    .command('transaction')
    .description('거래 의심 활동 분석')
    .requiredOption('-f, --file <path>', '거래 JSON 파일')
    .action(
      action('거래 분석', async (options: unknown) => {
        const { file } = FileOptionSchema.parse(options);
        const txn = TransactionRecordSchema.parse(await readJsonFile(ctx.io, file));
        return ctx.orchestrator().runTransaction(txn);
      }),
    );

  analyze
    .command('comprehensive')
    .description('KYC + 거래 종합 분석 (고위험 시 SAR 생성)')
    .requiredOption('-f, --file <path>', '{ "kyc": {...}, "transactions": [...] } JSON 파일')
    .action(
      action('종합 분석', async (options: unknown) => {
        const { file } = FileOptionSchema.parse(options);
        const req = ComprehensiveRequestSchema.parse(await readJsonFile(ctx.io, file));
        return ctx.orchestrator().runComprehensive(req.kyc, req.transactions);
      }),
    );

  // ─── compliance ───────────────────────────────────────────────────────────
  const compliance = program.command('compliance').description('컴플라이언스 provider');

  compliance
    .command('posture')
    .description('컴플라이언스 상태 판정')
    .action(action('컴플라이언스 판정', async () => ctx.liveGate().checkPosture()));

  compliance
    .command('summary')
    .description('컴플라이언스 요약 (점수, 컨트롤 수, 리스크 건수)')
    .action(
      action('컴플라이언스 요약', async () => summarizePosture(await ctx.liveGate().checkPosture())),
    );

  compliance
    .command('evidence <controlId>')
    .description('컨트롤 증빙 조회')
    .action(
      action('증빙 조회', async (controlId: string) => ({
        control_id: controlId,
        data: await ctx.complianceClient().getEvidence(controlId),
        timestamp: nowIso(),
      })),
    );

  compliance
    .command('login')
    .description('OAuth 로그인 (authorize URL 방문 후 redirect URL 붙여넣기)')
    .action(
      action('provider 로그인', async () => {
        const client = ctx.complianceClient();
        const state = ctx.oauthStates.issue();

        const callbackUrl = await ctx.io.ask(
          `아래 URL에서 권한을 승인한 뒤 redirect 된 URL을 붙여넣으세요.\n${client.getAuthorizationUrl(state)}\n> `,
        );

        const callback = parseAuthorizationCallback(callbackUrl);
        ctx.oauthStates.consume(callback.state);

        const token = await client.exchangeCodeForToken(callback.code);
        return {
          status: 'success',
          access_token: token.access_token,
          token_type: token.token_type,
          expires_in: token.expires_in ?? null,
          scope: token.scope ?? null,
          hint: 'COMPLIANCE_ACCESS_TOKEN 에 access_token 값을 설정하면 이후 명령에서 사용됩니다.',
        };
      }),
    );

  // ─── sar / audit ──────────────────────────────────────────────────────────
  program
    .command('sar')
    .description('SAR 조회')
    .command('get <sarId>')
    .requiredOption('-c, --customer <id>', '고객 ID')
    .action(
      action('SAR 조회', async (sarId: string, options: unknown) => {
        const { customer } = SarOptionSchema.parse(options);
        try {
          return await ctx.artifactStore().get('sar', customer, sarId);
        } catch (error) {
          if (error instanceof ArtifactNotFoundError) {
            throw new Error(`SAR 없음: ${sarId} (customer=${customer})`, { cause: error });
          }
          throw error;
        }
      }),
    );

  program
    .command('audit')
    .description('감사 로그')
    .command('log')
    .description('수동 감사 로그 기록')
    .requiredOption('-a, --action <action>', '액션 이름')
    .option('-d, --details <json>', '상세 JSON 객체', '{}')
    .option('-u, --user <id>', '사용자 ID', 'system')
    .action(
      action('감사 로그 기록', async (options: unknown) => {
        const opts = AuditOptionSchema.parse(options);
        let details: unknown;
        try {
          details = JSON.parse(opts.details);
        } catch (error) {
          throw new Error('details는 JSON 객체여야 합니다.', { cause: error });
        }
        return ctx
          .artifactStore()
          .appendAuditEntry(opts.action, AuditDetailsSchema.parse(details), opts.user);
      }),
    );

  // ─── status ───────────────────────────────────────────────────────────────
  program
    .command('status')
    .description('서비스 상태')
    .action(action('상태 조회', async () => ({ ...ctx.status(), timestamp: nowIso() })));

  return program;
}

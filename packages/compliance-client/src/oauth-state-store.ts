import { randomBytes } from 'node:crypto';
import { DateTime } from 'luxon';
import { OAuthStateError } from './errors.js';

export type OAuthStateStoreOptions = {
  ttlMs?: number;
  maxEntries?: number;
  clock?: () => number;
};

const DEFAULT_TTL_MS = 10 * 60_000; // 10분
const DEFAULT_MAX_ENTRIES = 1000;

/**
 * OAuth state 보관소
 *
 * 발급 후 ttlMs 안에 한 번만 consume 가능. 가득 차면 가장 오래된 state부터 버린다.
 */
export class OAuthStateStore {
  private readonly states = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(options: OAuthStateStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.clock = options.clock ?? (() => DateTime.now().toMillis());
  }

  get size(): number {
    return this.states.size;
  }

  issue(): string {
    const now = this.clock();
    this.pruneExpired(now);

    while (this.states.size >= this.maxEntries) {
      const oldest = this.states.keys().next();
      if (oldest.done) break;
      this.states.delete(oldest.value);
    }

    const state = randomBytes(32).toString('base64url');
    this.states.set(state, now);
    return state;
  }

  /**
   * @throws OAuthStateError 모르는 state이거나 만료된 경우
   */
  consume(state: string): void {
    const issuedAt = this.states.get(state);
    if (issuedAt === undefined) {
      throw new OAuthStateError('unknown');
    }

    this.states.delete(state);

    if (this.clock() - issuedAt > this.ttlMs) {
      throw new OAuthStateError('expired');
    }
  }

  private pruneExpired(now: number): void {
    for (const [state, issuedAt] of this.states) {
      if (now - issuedAt > this.ttlMs) this.states.delete(state);
    }
  }
}

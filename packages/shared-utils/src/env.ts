import 'dotenv/config';

/** 비어있는 값('')은 설정되지 않은 것으로 본다 */
export function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export function envNumber(key: string, defaultValue: number): number;
export function envNumber(key: string, defaultValue?: number): number | undefined;
export function envNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

export function envBoolean(key: string, defaultValue = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * 허용 목록 중 하나 (대소문자 무시). 미설정이면 기본값, 목록 밖이면 throw
 *
 * @example envEnum('LLM_PROVIDER', ['bedrock', 'openai'], 'bedrock')
 */
export function envEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = env(key);
  if (raw === undefined) return defaultValue;

  const normalized = raw.trim().toLowerCase();
  const matched = allowed.find((candidate) => candidate.toLowerCase() === normalized);
  if (matched === undefined) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join('|')}, got: ${raw}`);
  }
  return matched;
}

import { z } from 'zod';

/**
 * 입력 alias → 정식 필드명 (정식 필드가 이미 있으면 alias는 버린다)
 */
function withAlias(canonical: string, alias: string) {
  return (raw: unknown): unknown => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;

    const record: Record<string, unknown> = { ...raw };
    if (record[canonical] === undefined && record[alias] !== undefined) {
      record[canonical] = record[alias];
    }
    delete record[alias];
    return record;
  };
}

const IdSchema = z.string().trim().min(1);
const TextSchema = z.string().nullish();
const AmountSchema = z.number().finite().nullish();

export const KycProfileSchema = z.preprocess(
  withAlias('date_of_birth', 'dob'),
  z.object({
    customer_id: IdSchema,
    name: TextSchema,
    date_of_birth: TextSchema,
    address: TextSchema,
    occupation: TextSchema,
    annual_income: AmountSchema,
    source_of_funds: TextSchema,
    pep_status: z.string().default('No'),
    sanctions_check: z.string().default('Clear'),
  }),
);

export const TransactionRecordSchema = z.preprocess(
  withAlias('transaction_type', 'type'),
  z.object({
    transaction_id: IdSchema,
    amount: AmountSchema,
    currency: z.string().default('USD'),
    transaction_type: TextSchema,
    date: TextSchema,
    origin: TextSchema,
    destination: TextSchema,
    customer_id: IdSchema,
    purpose: TextSchema,
  }),
);

export const ComprehensiveRequestSchema = z.object({
  kyc: KycProfileSchema,
  transactions: z.array(TransactionRecordSchema).default([]),
});

export type KycProfile = Readonly<z.infer<typeof KycProfileSchema>>;
export type TransactionRecord = Readonly<z.infer<typeof TransactionRecordSchema>>;
export type ComprehensiveRequest = z.infer<typeof ComprehensiveRequestSchema>;

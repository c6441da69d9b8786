import type { KycProfile, TransactionRecord } from '../types/requests.js';
import type { AnalysisResult } from './resultSchema.js';

export const MISSING_VALUE = 'N/A';

function show(value: string | number | null | undefined): string {
  if (value === undefined || value === null) return MISSING_VALUE;
  const text = String(value).trim();
  return text === '' ? MISSING_VALUE : text;
}

export function buildKycPrompt(profile: KycProfile): string {
  return `
You are a financial compliance expert analyzing a KYC (Know Your Customer) profile for risk assessment.

Customer Data:
- Customer ID: ${show(profile.customer_id)}
- Name: ${show(profile.name)}
- Date of Birth: ${show(profile.date_of_birth)}
- Address: ${show(profile.address)}
- Occupation: ${show(profile.occupation)}
- Annual Income: ${show(profile.annual_income)}
- Source of Funds: ${show(profile.source_of_funds)}
- PEP Status: ${show(profile.pep_status)}
- Sanctions Check: ${show(profile.sanctions_check)}

Please analyze this KYC profile and provide:
1. Risk Level: LOW, MEDIUM, or HIGH
2. Risk Factors: List specific factors contributing to the risk assessment
3. Recommendations: Specific actions to mitigate identified risks
4. Compliance Notes: Any regulatory considerations

Respond with a single JSON object and nothing else, using exactly this structure:
{
    "risk_level": "LOW|MEDIUM|HIGH",
    "risk_score": 0-100,
    "risk_factors": ["factor1", "factor2", ...],
    "recommendations": ["recommendation1", "recommendation2", ...],
    "compliance_notes": ["note1", "note2", ...],
    "analysis_summary": "Brief summary of the analysis"
}
`.trim();
}

export function buildTransactionPrompt(txn: TransactionRecord): string {
  return `
You are a financial compliance expert analyzing a transaction for suspicious activity.

Transaction Data:
- Transaction ID: ${show(txn.transaction_id)}
- Amount: ${show(txn.amount)}
- Currency: ${show(txn.currency)}
- Transaction Type: ${show(txn.transaction_type)}
- Date: ${show(txn.date)}
- Origin: ${show(txn.origin)}
- Destination: ${show(txn.destination)}
- Customer ID: ${show(txn.customer_id)}
- Purpose: ${show(txn.purpose)}

Please analyze this transaction and provide:
1. Suspicion Level: LOW, MEDIUM, or HIGH
2. Red Flags: List specific indicators of suspicious activity
3. AML Concerns: Anti-Money Laundering considerations
4. Recommendations: Next steps for investigation

Respond with a single JSON object and nothing else, using exactly this structure:
{
    "suspicion_level": "LOW|MEDIUM|HIGH",
    "suspicion_score": 0-100,
    "red_flags": ["flag1", "flag2", ...],
    "aml_concerns": ["concern1", "concern2", ...],
    "recommendations": ["recommendation1", "recommendation2", ...],
    "analysis_summary": "Brief summary of the analysis"
}
`.trim();
}

export type SarBundle = {
  kyc_analysis: AnalysisResult;
  transaction_analyses: Array<AnalysisResult & { transaction_id: string }>;
  customer_id: string;
};

export function buildSarPrompt(bundle: SarBundle): string {
  return `
You are a financial compliance expert generating a Suspicious Activity Report (SAR).

Analysis Data:
${JSON.stringify(bundle, null, 2)}

Please generate a comprehensive SAR that includes:
1. Executive Summary
2. Subject Information
3. Suspicious Activity Description
4. Supporting Evidence
5. Risk Assessment
6. Recommendations

Respond with a single JSON object and nothing else, using exactly this structure:
{
    "sar_id": "SAR-YYYY-MM-DD-XXXX",
    "executive_summary": "Brief summary of the suspicious activity",
    "subject_information": {
        "customer_id": "customer_id",
        "name": "customer_name",
        "other_details": "..."
    },
    "suspicious_activity": {
        "description": "Detailed description of suspicious activity",
        "timeframe": "When the activity occurred",
        "amount": "Total amount involved"
    },
    "supporting_evidence": ["evidence1", "evidence2", ...],
    "risk_assessment": "Overall risk assessment",
    "recommendations": ["recommendation1", "recommendation2", ...],
    "filing_instructions": "Instructions for filing with FinCEN"
}
`.trim();
}

import type { DecisionOutcome } from './policy.js';

export interface QueryResponse {
  responseText: string;
  decisionOutcome: DecisionOutcome;
  /** Request id keying every audit record written for this query. */
  auditId: string;
}

export interface HttpQueryResponse {
  request_id: string;
  correlation_id?: string;
  response_text: string;
  decision_outcome: DecisionOutcome;
  audit_id: string;
  stages: string[];
  processing_time_ms: number;
}

export interface ErrorResponse {
  request_id: string;
  error_code: string;
  message: string;
}

export const SAFE_REFUSAL = "I can't complete this request.";

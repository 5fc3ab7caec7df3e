export type AuditStage = 'classification' | 'decision' | 'generation' | 'validation' | 'execution';

export interface AuditActor {
  user_id: string;
  tenant: string;
  roles: string[];
}

export interface AuditRecord {
  event_id: string;
  request_id: string;
  stage: AuditStage;
  timestamp: string;
  actor: AuditActor;
  outcome: string;
  summary: Record<string, unknown>;
  payload_hash: string;
  prev_record_hash: string;
  querygate_version: string;
  signature?: string;
}

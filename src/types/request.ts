export interface Identity {
  userId: string;
  tenant: string;
  roles: string[];
  /** Sensitivity tags (e.g. `PII`) this identity may read. */
  entitlements: string[];
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

// Upstream request interface; nothing else may influence the decision path.
export interface QueryRequest {
  queryText: string;
  identity: Identity;
  conversationContext?: ConversationTurn[];
}

export interface Query {
  readonly requestId: string;
  /** Caller-supplied id, kept beside the server-generated request id. */
  readonly correlationId?: string;
  readonly text: string;
  readonly context: readonly ConversationTurn[];
  readonly identity: Readonly<Identity>;
  readonly receivedAt: string;
}

import type { DecisionReason, ExecutionResult, PolicyDecision } from '../types/index.js';
import type { TextModel } from '../inference/router.js';
import { errorMessage } from '../errors.js';
import { runWithDeadline } from '../deadline.js';
import { silentLogger, type Logger } from '../logger.js';

export const NO_DATA_SYSTEM_PROMPT = `You answer general business and finance questions.
You have no access to any enterprise system, database, report or record, and you must not
reference, guess or invent figures, names or facts about the user's organisation.
If the question needs company data, say that it needs a data request instead.`;

export const NO_DATA_DISABLED =
  'This is a general-knowledge question, so no enterprise data was accessed. ' +
  'General-knowledge answers are not enabled on this deployment.';

export const NO_DATA_FALLBACK =
  'This is a general-knowledge question, so no enterprise data was accessed. ' +
  'A general explanation is not available right now; please try again.';

export const VALIDATION_FAILURE_MESSAGE = 'Request denied: this request cannot be completed.';

export const EXECUTION_FAILURE_MESSAGE =
  'The data request was authorized but could not be executed. Please try again later.';

export const GENERATION_FAILURE_MESSAGE =
  'Request denied: this request could not be turned into a supported data query.';

const REFUSALS: Record<Exclude<DecisionReason, 'SAFE_KNOWLEDGE' | 'AUTHORIZED'>, string> = {
  LOW_CONFIDENCE: 'Request denied (LOW_CONFIDENCE): the request could not be classified with enough confidence to allow data access. Please rephrase it more specifically.',
  UNKNOWN_INTENT: 'Request denied (UNKNOWN_INTENT): this kind of request is not supported.',
  INSUFFICIENT_ENTITLEMENT: 'Request denied (INSUFFICIENT_ENTITLEMENT): your account lacks the role required for this kind of data request.',
  OUT_OF_SCOPE: 'Request denied (OUT_OF_SCOPE): this request is outside what this assistant is permitted to do.'
};

export function refusalFor(reason: DecisionReason): string {
  switch (reason) {
    case 'SAFE_KNOWLEDGE':
    case 'AUTHORIZED':
      // A DENY decision never carries these; refuse generically rather than guess
      return VALIDATION_FAILURE_MESSAGE;
    default:
      return REFUSALS[reason];
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function renderTable(result: ExecutionResult): string {
  if (result.rows.length === 0) {
    return 'No matching records were found.';
  }

  const cells = result.rows.map((row) => result.columns.map((column) => formatValue(row[column])));
  const widths = result.columns.map((column, i) =>
    Math.max(column.length, ...cells.map((line) => line[i]?.length ?? 0))
  );
  const renderLine = (values: string[]) => values.map((value, i) => value.padEnd(widths[i] ?? 0)).join(' | ').trimEnd();

  const lines = [
    renderLine(result.columns),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderLine),
    '',
    `${result.rowCount} row${result.rowCount === 1 ? '' : 's'}${result.truncated ? ' (truncated to the row limit)' : ''}.`
  ];
  if (result.maskedFields.length > 0) {
    lines.push(`Redacted fields: ${result.maskedFields.join(', ')}.`);
  }
  return lines.join('\n');
}

export interface SynthesizerOptions {
  /** Model used for no-data answers; without one a fixed notice is returned. */
  knowledgeModel?: TextModel;
  backend?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class ResponseSynthesizer {
  private readonly logger: Logger;

  constructor(private readonly options: SynthesizerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async synthesize(decision: PolicyDecision, query: string, result?: ExecutionResult): Promise<string> {
    switch (decision.outcome) {
      case 'DENY':
        return refusalFor(decision.reason);

      case 'ALLOW_NO_DATA':
        return this.answerWithoutData(query);

      case 'ALLOW_WITH_AUTH':
        return result ? renderTable(result) : EXECUTION_FAILURE_MESSAGE;
    }
  }

  private async answerWithoutData(query: string): Promise<string> {
    const model = this.options.knowledgeModel;
    if (!model) return NO_DATA_DISABLED;

    const timeoutMs = this.options.timeoutMs ?? 15000;
    try {
      const response = await runWithDeadline(
        (signal) =>
          model.infer({ input: query, systemPrompt: NO_DATA_SYSTEM_PROMPT, maxTokens: 512, signal }, this.options.backend),
        timeoutMs,
        () => new Error(`Knowledge answer timed out after ${timeoutMs}ms`)
      );
      return response.output.trim() || NO_DATA_FALLBACK;
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, 'Knowledge answer failed');
      return NO_DATA_FALLBACK;
    }
  }
}

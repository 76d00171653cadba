export const INTENTS = ['check_connectivity', 'list_disconnected', 'unknown'] as const;

export type Intent = (typeof INTENTS)[number];

export type Locale = 'fr' | 'en';

export type IntentStrategy = 'pattern' | 'model';

export interface IntentResult {
  intent: Intent;
  /** Organization named in the message; undefined when the caller should fall back to the default. */
  organization?: string;
}

export interface ExtractionFailure {
  reason: 'empty_output' | 'invalid_json' | 'invalid_structure';
  /** Start of the offending model output, for diagnostics. */
  snippet: string;
}

export type ExtractionOutcome =
  | { success: true; result: IntentResult }
  | { success: false; failure: ExtractionFailure };

export interface StatusSummary {
  connectedCount: number;
  disconnectedCount: number;
  disconnectedIds: string[];
}

export interface ChatRequest {
  message: string;
  locale?: Locale;
}

export interface ChatResponse {
  answer: string;
}

export function emptySummary(): StatusSummary {
  return { connectedCount: 0, disconnectedCount: 0, disconnectedIds: [] };
}

export function requiresStatus(intent: Intent): boolean {
  return intent === 'check_connectivity' || intent === 'list_disconnected';
}

import type { ExtractionOutcome, IntentStrategy } from '../types';

export interface IntentExtractor {
  readonly strategy: IntentStrategy;
  extract(message: string): Promise<ExtractionOutcome>;
}

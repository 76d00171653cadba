import type { CompletionClient } from '../../services/model-client';
import type { IntentStrategy } from '../types';
import type { IntentExtractor } from './extractor';
import { ModelIntentExtractor } from './model-extractor';
import { PatternIntentExtractor } from './pattern-extractor';

export type { IntentExtractor } from './extractor';

export function createIntentExtractor(
  strategy: IntentStrategy,
  completionClient: CompletionClient | null,
): IntentExtractor {
  if (strategy === 'pattern') {
    return new PatternIntentExtractor();
  }
  if (!completionClient) {
    throw new Error('Model intent strategy requires a completion client');
  }
  return new ModelIntentExtractor(completionClient);
}

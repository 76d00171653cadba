import type { ExtractionOutcome, Intent } from '../types';
import type { IntentExtractor } from './extractor';

interface PatternRule {
  intent: Exclude<Intent, 'unknown'>;
  /** Every group needs at least one of its keywords among the message tokens. */
  groups: ReadonlyArray<ReadonlySet<string>>;
}

// Keywords are compared against lower-cased tokens with diacritics removed.
const RULES: readonly PatternRule[] = [
  {
    intent: 'check_connectivity',
    groups: [
      new Set(['tous', 'toutes', 'all', 'every']),
      new Set(['connecte', 'connectes', 'connectee', 'connectees', 'connected', 'online']),
    ],
  },
  {
    intent: 'list_disconnected',
    groups: [
      new Set(['liste', 'lister', 'list', 'quels', 'quelles', 'which', 'show']),
      new Set([
        'deconnecte',
        'deconnectes',
        'deconnectee',
        'deconnectees',
        'disconnected',
        'offline',
      ]),
    ],
  },
];

export function tokenize(message: string): Set<string> {
  const folded = message
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
  return new Set(folded.split(/[^a-z0-9]+/).filter((token) => token.length > 0));
}

export function matchIntent(message: string): Intent {
  const tokens = tokenize(message);
  const rule = RULES.find((candidate) =>
    candidate.groups.every((group) => [...group].some((keyword) => tokens.has(keyword))),
  );
  return rule?.intent ?? 'unknown';
}

export class PatternIntentExtractor implements IntentExtractor {
  readonly strategy = 'pattern' as const;

  async extract(message: string): Promise<ExtractionOutcome> {
    return { success: true, result: { intent: matchIntent(message) } };
  }
}

import { z } from 'zod';
import type { CompletionClient } from '../../services/model-client';
import { INTENTS, type ExtractionFailure, type ExtractionOutcome } from '../types';
import type { IntentExtractor } from './extractor';
import { STOP_SEQUENCE, buildExtractionPrompt } from './prompt';

const MAX_OUTPUT_TOKENS = 256;
const SNIPPET_LENGTH = 200;

const modelPayloadSchema = z.object({
  intent: z.enum(INTENTS).catch('unknown'),
  company: z
    .string()
    .nullish()
    .catch(null)
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    }),
});

// A fence is unwrapped only when it spans the whole output.
function stripCodeFence(value: string): string {
  const trimmed = value.trim();
  const codeMatch = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (codeMatch) {
    return codeMatch[1].trim();
  }
  return trimmed;
}

function fail(reason: ExtractionFailure['reason'], raw: string): ExtractionOutcome {
  return { success: false, failure: { reason, snippet: raw.slice(0, SNIPPET_LENGTH) } };
}

export function parseModelOutput(raw: string): ExtractionOutcome {
  const text = stripCodeFence(raw);
  if (!text) {
    return fail('empty_output', raw);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return fail('invalid_json', text);
  }

  const parsed = modelPayloadSchema.safeParse(json);
  if (!parsed.success) {
    return fail('invalid_structure', text);
  }

  const { intent, company } = parsed.data;
  return {
    success: true,
    result: company ? { intent, organization: company } : { intent },
  };
}

export class ModelIntentExtractor implements IntentExtractor {
  readonly strategy = 'model' as const;

  constructor(private readonly client: CompletionClient) {}

  async extract(message: string): Promise<ExtractionOutcome> {
    const output = await this.client.complete({
      prompt: buildExtractionPrompt(message),
      maxTokens: MAX_OUTPUT_TOKENS,
      temperature: 0,
      stop: [STOP_SEQUENCE],
    });
    return parseModelOutput(output);
  }
}

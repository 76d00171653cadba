import { INTENTS } from '../types';

export const SYSTEM_PROMPT = [
  'You are an extraction agent that converts a user request about IoT sensors into a JSON payload.',
  'Supported JSON schema:',
  '{',
  `  "intent": string,    // one of ${INTENTS.map((intent) => `'${intent}'`).join(', ')}`,
  '  "company": string|null // company name mentioned by the user',
  '}',
  '',
  'Return ONLY the JSON, without additional text.',
].join('\n');

export const STOP_SEQUENCE = '</s>';

/** Instruction-tuned chat template with an inline system block. */
export function buildExtractionPrompt(message: string): string {
  return `<s>[INST] <<SYS>>\n${SYSTEM_PROMPT}\n<</SYS>>\n\n${message}\n[/INST]`;
}

import { ExtractionError } from './errors';
import type { IntentExtractor } from './intent';
import { composeAnswer } from './response-composer';
import type { StatusAggregator } from './status-aggregator';
import {
  requiresStatus,
  type ChatRequest,
  type ChatResponse,
  type IntentResult,
  type StatusSummary,
} from './types';

export interface PipelineLogger {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

export interface ChatPipelineConfig {
  extractor: IntentExtractor;
  aggregator: StatusAggregator;
  defaultOrganization: string;
  /** Surface unreadable model output as ExtractionError instead of asking the user to rephrase. */
  strictExtraction: boolean;
  logger: PipelineLogger;
}

export class ChatPipeline {
  constructor(private readonly config: ChatPipelineConfig) {}

  async handle(request: ChatRequest): Promise<ChatResponse> {
    const message = request.message.trim();
    const locale = request.locale ?? 'fr';
    const { extractor, logger } = this.config;

    const outcome = await extractor.extract(message);
    let extracted: IntentResult;
    if (outcome.success) {
      extracted = outcome.result;
    } else if (this.config.strictExtraction) {
      throw new ExtractionError(outcome.failure);
    } else {
      logger.warn(
        { strategy: extractor.strategy, ...outcome.failure },
        'Intent extraction failed; answering with clarification',
      );
      extracted = { intent: 'unknown' };
    }

    const organization = extracted.organization ?? this.config.defaultOrganization;
    let summary: StatusSummary | undefined;
    if (requiresStatus(extracted.intent)) {
      summary = await this.config.aggregator.summarize(organization);
    }

    logger.info(
      {
        strategy: extractor.strategy,
        intent: extracted.intent,
        organization,
        disconnectedCount: summary?.disconnectedCount,
      },
      'Chat request resolved',
    );

    return { answer: composeAnswer(extracted.intent, summary, locale) };
  }
}

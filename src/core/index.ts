export { ChatPipeline } from './chat-pipeline';
export type { ChatPipelineConfig, PipelineLogger } from './chat-pipeline';
export { StatusAggregator } from './status-aggregator';
export type { StatusAggregatorConfig } from './status-aggregator';
export { composeAnswer, MAX_LISTED_SENSORS } from './response-composer';
export { AggregationError, ExtractionError, ModelRequestError } from './errors';
export { createIntentExtractor } from './intent';
export type { IntentExtractor } from './intent';
export {
  INTENTS,
  emptySummary,
  requiresStatus,
  type Intent,
  type IntentResult,
  type IntentStrategy,
  type Locale,
  type StatusSummary,
  type ChatRequest,
  type ChatResponse,
  type ExtractionFailure,
  type ExtractionOutcome,
} from './types';

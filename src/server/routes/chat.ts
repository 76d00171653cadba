import type { FastifyInstance } from 'fastify';
import type { ChatPipeline } from '../../core/chat-pipeline';
import { AggregationError, ExtractionError, ModelRequestError } from '../../core/errors';
import type { Locale } from '../../core/types';

interface ChatBody {
  message?: unknown;
  locale?: unknown;
}

function parseLocale(value: unknown): Locale | null {
  if (value === undefined || value === null) return 'fr';
  if (value === 'fr' || value === 'en') return value;
  return null;
}

export interface RegisterChatRouteOptions {
  pipeline: ChatPipeline;
}

export function registerChatRoute(
  server: FastifyInstance,
  options: RegisterChatRouteOptions,
): void {
  const { pipeline } = options;

  server.post<{ Body: ChatBody | undefined }>('/chat', async (request, reply) => {
    const body = request.body ?? {};
    const message = typeof body.message === 'string' ? body.message.trim() : '';
    if (!message) {
      return reply.status(400).send({ error: 'Missing or empty message.' });
    }
    const locale = parseLocale(body.locale);
    if (!locale) {
      return reply.status(400).send({ error: 'locale must be "fr" or "en".' });
    }

    try {
      const result = await pipeline.handle({ message, locale });
      return reply.status(200).send(result);
    } catch (err) {
      if (err instanceof ExtractionError) {
        request.log.warn({ reason: err.reason }, 'POST /chat extraction failed');
        return reply.status(422).send({
          error: err.message,
          reason: err.reason,
          snippet: err.snippet,
        });
      }
      if (err instanceof ModelRequestError) {
        request.log.error({ err }, 'POST /chat model request failed');
        return reply.status(502).send({ error: err.message });
      }
      if (err instanceof AggregationError) {
        request.log.error({ err, organization: err.organization }, 'POST /chat aggregation failed');
        return reply.status(500).send({ error: err.message });
      }
      request.log.error({ err }, 'POST /chat failed');
      return reply.status(500).send({
        error: err instanceof Error ? err.message : 'Chat failed.',
      });
    }
  });
}

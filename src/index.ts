/**
 * Sensor connectivity chat service: POST /chat answers French or English questions
 * about an organization's sensor fleet from the sensor store.
 */
import { loadEnv } from './config/env';
import { ChatPipeline, StatusAggregator, createIntentExtractor } from './core';
import { createServer } from './server/create-server';
import { registerChatRoute } from './server/routes/chat';
import { ModelServerClient } from './services/model-client';
import { MongoSensorStore } from './store/mongo-sensor-store';

async function main() {
  const env = loadEnv();
  const server = createServer(env.intentStrategy);

  // Both the store and the model must be reachable before serving; no degraded mode.
  const store = await MongoSensorStore.connect({
    uri: env.mongodbUri,
    dbName: env.dbName,
    collection: env.sensorCollection,
    connectTimeoutMs: env.storeConnectTimeoutMs,
  });
  await store.ping();
  server.log.info({ dbName: env.dbName, collection: env.sensorCollection }, 'Sensor store connected');

  let modelClient: ModelServerClient | null = null;
  if (env.intentStrategy === 'model') {
    modelClient = new ModelServerClient({
      baseUrl: env.modelServerUrl,
      apiKey: env.modelApiKey,
      requestTimeoutMs: env.modelRequestTimeoutMs,
    });
    const { contextSize } = await modelClient.verify(env.modelCtx);
    server.log.info({ modelServerUrl: env.modelServerUrl, contextSize }, 'Model server ready');
  }

  const pipeline = new ChatPipeline({
    extractor: createIntentExtractor(env.intentStrategy, modelClient),
    aggregator: new StatusAggregator({
      store,
      defaultThresholdDays: env.stalenessDays,
      timeoutMs: env.aggregationTimeoutMs,
    }),
    defaultOrganization: env.defaultOrganization,
    strictExtraction: env.extractionStrict,
    logger: server.log,
  });

  registerChatRoute(server, { pipeline });

  server.addHook('onClose', async () => {
    await store.close();
  });

  try {
    await server.listen({ port: env.port, host: '0.0.0.0' });
    server.log.info(
      { port: env.port, strategy: env.intentStrategy, strict: env.extractionStrict },
      'Chat server started',
    );
  } catch (error) {
    server.log.error(error, 'Failed to start server');
    await store.close();
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error starting chat service:', error);
  process.exit(1);
});

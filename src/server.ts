import { env } from './config/env.js';
import { toEmbeddingConfig, toGenerationConfig, toPromptMode } from './config/env.schema.js';
import { createApp } from './app.js';
import { createSqlClient } from './core/pool-manager.js';
import { createGenerationClient } from './modules/ai/generation-client.js';
import { NlQueryService } from './modules/query/nl-query.service.js';
import { createEmbeddingProvider } from './modules/schema/embedding-provider.js';
import { SchemaIndex } from './modules/schema/schema-index.js';
import { InformationSchemaProvider } from './modules/schema/schema-provider.js';

async function bootstrap(): Promise<void> {
  const schemaProvider = new InformationSchemaProvider(createSqlClient(env.DATABASE_URL));
  const index = await SchemaIndex.open({
    embedder: createEmbeddingProvider(toEmbeddingConfig(env)),
    storePath: env.SCHEMA_INDEX_DIR
  });
  const promptMode = toPromptMode(env);

  const service = new NlQueryService({
    schemaProvider,
    index,
    generationClient: createGenerationClient(toGenerationConfig(env)),
    promptMode,
    cacheTtlSeconds: env.AI_CACHE_TTL,
    maxCacheSize: env.AI_MAX_CACHE_SIZE
  });
  const tables = await service.initialize();

  const app = createApp({
    service,
    corsOrigin: env.NODE_ENV === 'development' ? 'http://localhost:5173' : [],
    rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    defaultTopK: env.PROMPT_TOP_K,
    sampleRowLimit: env.SAMPLE_ROW_LIMIT
  });

  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Server running in ${env.NODE_ENV} mode on port ${env.PORT} (${tables} tables, index ${index.mode} mode)`);
  });

  const shutdown = (signal: string) => {
    console.log(`[${new Date().toISOString()}] [SERVER] ${signal} received, shutting down`);
    server.close(() => {
      service
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to close database pool:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});

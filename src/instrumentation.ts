import dotenv from 'dotenv';
import path from 'path';

// Load env vars before anything else
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, '../.env'), override: true });

import { LangfuseSpanProcessor } from '@langfuse/otel';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { setLangfuseTracerProvider } from '@langfuse/tracing';
import { isTracingEnabled } from './agents/llm';

/**
 * Langfuse tracing with OpenTelemetry.
 *
 * The @langfuse/langchain CallbackHandler creates spans through @langfuse/tracing;
 * they only leave the process through a TracerProvider carrying the
 * LangfuseSpanProcessor. The provider is registered for Langfuse only, not globally.
 */
function initTracing(): LangfuseSpanProcessor | null {
  if (!isTracingEnabled()) {
    return null;
  }

  const processor = new LangfuseSpanProcessor({
    publicKey: process.env.LANGFUSE_PUBLIC_KEY,
    secretKey: process.env.LANGFUSE_SECRET_KEY,
    baseUrl: process.env.LANGFUSE_HOST || 'https://us.cloud.langfuse.com',
  });

  const provider = new NodeTracerProvider({
    spanProcessors: [processor],
  });
  setLangfuseTracerProvider(provider);

  console.log('🔭 Langfuse tracing enabled');
  return processor;
}

const spanProcessor = initTracing();

/**
 * Export pending spans; called on shutdown.
 */
export async function flushTracing(): Promise<void> {
  if (spanProcessor) {
    await spanProcessor.forceFlush();
  }
}

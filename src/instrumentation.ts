import { LangfuseSpanProcessor } from '@langfuse/otel';
import { setLangfuseTracerProvider } from '@langfuse/tracing';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import type { Config } from './config';

export function isLangfuseEnabled(config: Config): boolean {
  return Boolean(config.langfuse.publicKey && config.langfuse.secretKey);
}

/**
 * Registers a Langfuse-only TracerProvider so the LangChain callback handler's
 * spans are exported. Returns null when the Langfuse keys are not set.
 */
export function initLangfuseTracing(config: Config): LangfuseSpanProcessor | null {
  if (!isLangfuseEnabled(config)) {
    return null;
  }

  const spanProcessor = new LangfuseSpanProcessor({
    publicKey: config.langfuse.publicKey,
    secretKey: config.langfuse.secretKey,
    baseUrl: config.langfuse.baseUrl,
  });

  // Isolated from any global OTel setup
  const provider = new NodeTracerProvider({
    spanProcessors: [spanProcessor],
  });
  setLangfuseTracerProvider(provider);

  console.log('LangFuse: TracerProvider initialized', { host: config.langfuse.baseUrl });
  return spanProcessor;
}

import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ParentBasedSampler, TraceIdRatioBasedSampler } from '@opentelemetry/sdk-trace-base';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { createLogger } from './lib/log.js';
import { RedactingSpanExporter } from './lib/redact.js';

const log = createLogger('otel');

const otlpBase =
  process.env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim() ||
  process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT?.trim() ||
  '';

const enableTracing =
  (process.env.OTEL_TRACING_ENABLED ?? '').toLowerCase() === 'true' ||
  (process.env.NODE_ENV === 'production' && otlpBase.length > 0);

if (!enableTracing) {
  log.info('tracing_disabled', { hint: 'set OTEL_EXPORTER_OTLP_ENDPOINT or OTEL_TRACING_ENABLED=true' });
} else {
  if ((process.env.OTEL_LOG_LEVEL ?? '').toUpperCase() === 'DEBUG') {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  const base = otlpBase.replace(/\/$/, '');
  const tracesEndpoint =
    process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT?.trim() || `${base}/v1/traces`;

  const ratioRaw = process.env.OTEL_TRACES_SAMPLER_ARG?.trim();
  const ratio = ratioRaw ? Number(ratioRaw) : 0.2;
  const sampleRatio = Number.isFinite(ratio) ? Math.min(1, Math.max(0, ratio)) : 0.2;

  const serviceName = process.env.OTEL_SERVICE_NAME?.trim() || 'lakehouse_api';
  const environment =
    process.env.DEPLOYMENT_ENVIRONMENT?.trim() || process.env.NODE_ENV || 'production';

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
      [SemanticResourceAttributes.SERVICE_NAMESPACE]: 'lakehouse',
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: environment,
    }),
    sampler: new ParentBasedSampler({
      root: new TraceIdRatioBasedSampler(sampleRatio),
    }),
    traceExporter: new RedactingSpanExporter(new OTLPTraceExporter({ url: tracesEndpoint })),
    instrumentations: [getNodeAutoInstrumentations()],
  });

  sdk.start();
  log.info('tracing_enabled', { service_name: serviceName, sample_ratio: sampleRatio, traces_endpoint: tracesEndpoint });

  const shutdown = async (signal: string) => {
    log.info('tracing_shutdown', { signal });
    try {
      await sdk.shutdown();
    } catch (err) {
      log.error('tracing_shutdown_error', { error: err instanceof Error ? err.message : String(err) });
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
}

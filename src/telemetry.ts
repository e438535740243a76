/**
 * OpenTelemetry setup for the marketing crew.
 *
 * Crew runs are wrapped in spans through the `@opentelemetry/api` tracer
 * (see crews/agentkit-runner.ts). Those spans are no-ops until this SDK is
 * started, which only happens when OTEL_ENABLED=true.
 */
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { Config } from './config';
import type { Logger } from './logger';

export interface Telemetry {
  shutdown(): Promise<void>;
}

const disabled: Telemetry = {
  shutdown: async () => undefined,
};

/**
 * Initialize and start the OpenTelemetry SDK.
 */
export function initTelemetry(config: Config['telemetry'], logger: Logger): Telemetry {
  const log = logger.child({ component: 'telemetry' });

  if (!config.enabled) {
    log.debug('OpenTelemetry disabled (set OTEL_ENABLED=true to export traces)');
    return disabled;
  }

  log.info({ serviceName: config.serviceName, endpoint: config.otlpEndpoint }, 'Initializing OpenTelemetry');

  const traceExporter = new OTLPTraceExporter({
    url: config.otlpEndpoint,
    timeoutMillis: 10000,
  });

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? '1.0.0',
    }),
    spanProcessors: [new BatchSpanProcessor(traceExporter)],
  });

  sdk.start();

  return {
    async shutdown() {
      log.info('Shutting down OpenTelemetry SDK');
      try {
        await sdk.shutdown();
      } catch (error) {
        log.error({ err: error }, 'Error shutting down OpenTelemetry SDK');
      }
    },
  };
}

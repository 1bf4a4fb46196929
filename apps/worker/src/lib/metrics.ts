import {
  MeterProvider,
  PeriodicExportingMetricReader
} from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import type { Attributes } from '@opentelemetry/api';

// ============ CONFIGURATION ============
// Without an endpoint the instruments still work but nothing is exported
const OTLP_ENDPOINT = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
const SERVICE_NAME = 'manifest-audit-worker';
const EXPORT_INTERVAL_MS = 60000;

// ============ SETUP ============
const resource = new Resource({
  [SemanticResourceAttributes.SERVICE_NAME]: SERVICE_NAME,
  [SemanticResourceAttributes.SERVICE_VERSION]: process.env.APP_VERSION || '1.0.0',
  [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: process.env.NODE_ENV || 'development',
});

const meterProvider = new MeterProvider({
  resource,
  readers: OTLP_ENDPOINT
    ? [
        new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: OTLP_ENDPOINT }),
          exportIntervalMillis: EXPORT_INTERVAL_MS,
        }),
      ]
    : [],
});

const meter = meterProvider.getMeter(SERVICE_NAME);

// Counters
const usersEnumeratedCounter = meter.createCounter('users_enumerated_total', {
  description: 'Domain users handed to the worker pool',
});

const projectsFoundCounter = meter.createCounter('projects_found_total', {
  description: 'Standalone Apps Script projects discovered',
});

const manifestsCounter = meter.createCounter('manifests_total', {
  description: 'Manifest extractions by outcome',
});

const rowsWrittenCounter = meter.createCounter('rows_written_total', {
  description: 'Rows appended to the audit table',
});

const errorsCounter = meter.createCounter('errors_total', {
  description: 'Failures by error class',
});

// Histograms
const runDurationHistogram = meter.createHistogram('run_duration_ms', {
  description: 'Duration of a full audit run in milliseconds',
  unit: 'ms',
});

const userScanDurationHistogram = meter.createHistogram('user_scan_duration_ms', {
  description: 'Time spent locating and extracting one user\'s projects',
  unit: 'ms',
});

// ============ METRICS API ============
export type CounterName =
  | 'users_enumerated_total'
  | 'projects_found_total'
  | 'manifests_total'
  | 'rows_written_total'
  | 'errors_total';

export type HistogramName = 'run_duration_ms' | 'user_scan_duration_ms';

export const metrics = {
  counter: (name: CounterName, value: number = 1, attributes: Attributes = {}) => {
    switch (name) {
      case 'users_enumerated_total':
        usersEnumeratedCounter.add(value, attributes);
        break;
      case 'projects_found_total':
        projectsFoundCounter.add(value, attributes);
        break;
      case 'manifests_total':
        manifestsCounter.add(value, attributes);
        break;
      case 'rows_written_total':
        rowsWrittenCounter.add(value, attributes);
        break;
      case 'errors_total':
        errorsCounter.add(value, attributes);
        break;
    }
  },

  histogram: (name: HistogramName, value: number, attributes: Attributes = {}) => {
    switch (name) {
      case 'run_duration_ms':
        runDurationHistogram.record(value, attributes);
        break;
      case 'user_scan_duration_ms':
        userScanDurationHistogram.record(value, attributes);
        break;
    }
  },
};

export type Metrics = typeof metrics;

// ============ GRACEFUL SHUTDOWN ============
export async function shutdownMetrics(): Promise<void> {
  await meterProvider.shutdown();
}

export default metrics;

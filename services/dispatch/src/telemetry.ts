import { NodeSdk } from "@effect/opentelemetry"
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http"
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http"
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics"
import { BatchLogRecordProcessor } from "@opentelemetry/sdk-logs"
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-node"

const otlpEndpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318"
const exporterUrl = (signal: "traces" | "metrics" | "logs") => `${otlpEndpoint}/v1/${signal}`

const metricIntervalMillis = Number(process.env.OTEL_METRIC_EXPORT_INTERVAL ?? "10000")

// Spans from DeliveryService.* and the route handlers, plus Effect logs, go out over OTLP/HTTP
export const TelemetryLive = NodeSdk.layer(() => ({
  resource: {
    serviceName: process.env.OTEL_SERVICE_NAME ?? "dispatch-service",
    serviceVersion: process.env.SERVICE_VERSION ?? "0.1.0",
    attributes: {
      "service.namespace": "delivery",
      "deployment.environment": process.env.NODE_ENV ?? "development"
    }
  },
  spanProcessor: new BatchSpanProcessor(new OTLPTraceExporter({ url: exporterUrl("traces") })),
  metricReader: new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({ url: exporterUrl("metrics") }),
    exportIntervalMillis: Number.isFinite(metricIntervalMillis) ? metricIntervalMillis : 10000
  }),
  logRecordProcessor: new BatchLogRecordProcessor(new OTLPLogExporter({ url: exporterUrl("logs") }))
}))

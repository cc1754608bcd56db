import { diag, DiagConsoleLogger, DiagLogLevel, SpanStatusCode, trace } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { isTestRuntime } from "../env";

let sdk: NodeSDK | null = null;

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  ALL: DiagLogLevel.ALL,
  VERBOSE: DiagLogLevel.VERBOSE,
  DEBUG: DiagLogLevel.DEBUG,
  INFO: DiagLogLevel.INFO,
  WARN: DiagLogLevel.WARN,
  ERROR: DiagLogLevel.ERROR,
  NONE: DiagLogLevel.NONE,
};

function shouldEnableTracing(): boolean {
  const explicit = process.env.OTEL_ENABLED;
  if (explicit === "false") return false;
  if (explicit === "true") return true;
  return !isTestRuntime();
}

function buildTraceExporter(): OTLPTraceExporter | undefined {
  const endpoint = (process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT
    || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "").trim();
  return endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined;
}

export function startTracing(): void {
  if (sdk || !shouldEnableTracing()) return;

  const diagLevel = DIAG_LEVELS[(process.env.OTEL_DIAG_LOG_LEVEL || "").trim().toUpperCase()];
  if (diagLevel != null) {
    diag.setLogger(new DiagConsoleLogger(), diagLevel);
  }

  try {
    const nextSdk = new NodeSDK({
      serviceName: process.env.OTEL_SERVICE_NAME || "spring-shop-api",
      traceExporter: buildTraceExporter(),
      instrumentations: [
        new FastifyInstrumentation({
          requestHook: (span, info) => {
            const reqId = String(info?.request?.id || "").trim();
            if (reqId) span.setAttribute("request.id", reqId);
          },
        }),
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          "@opentelemetry/instrumentation-fastify": { enabled: false },
          "@opentelemetry/instrumentation-pg": { enhancedDatabaseReporting: false },
        }),
      ],
    });
    nextSdk.start();
    sdk = nextSdk;
  } catch (error) {
    // Tracing must never block API startup.
    console.error("Failed to initialize OpenTelemetry tracing", error);
  }
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const running = sdk;
  sdk = null;
  await running.shutdown();
}

/**
 * Runs `fn` inside a span of the report tracer. Without a started SDK the
 * global no-op tracer is used.
 */
export async function withReportSpan<T>(
  name: string,
  attributes: Record<string, string | number>,
  fn: () => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer("spring-shop-report");
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof Error) span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}

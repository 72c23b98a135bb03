import { SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import type { Env } from "./config.js";

const SERVICE_NAME = "ragengine-ingest";

interface StartedSdk {
  shutdown(): Promise<void>;
}

let sdk: StartedSdk | null = null;

/**
 * Initialises the OpenTelemetry SDK.
 * No-op unless OTEL_ENABLED=true.
 */
export async function initTracing(env: Env = process.env): Promise<void> {
  if (env.OTEL_ENABLED !== "true") return;
  if (sdk) return;

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { getNodeAutoInstrumentations } = await import(
    "@opentelemetry/auto-instrumentations-node"
  );
  const { OTLPTraceExporter } = await import(
    "@opentelemetry/exporter-trace-otlp-http"
  );

  const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";

  const nodeSdk = new NodeSDK({
    serviceName: SERVICE_NAME,
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    instrumentations: [getNodeAutoInstrumentations()],
  });

  nodeSdk.start();
  sdk = nodeSdk;
}

/** Flushes pending spans. A CLI exits right after its command, so this runs last. */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const started = sdk;
  sdk = null;
  await started.shutdown();
}

/**
 * Returns a tracer for this service.
 * When no SDK is registered all spans are no-ops.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Runs `fn` inside a span, recording OK or ERROR and rethrowing failures.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>,
): Promise<T> {
  const span = getTracer().startSpan(name, { attributes });
  try {
    const result = await fn();
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
    throw error;
  } finally {
    span.end();
  }
}

/** Reset internal state (for tests only). */
export function _resetTracing(): void {
  sdk = null;
}

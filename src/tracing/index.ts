/**
 * tracing/index.ts - OpenTelemetry initialization for cluster-collector
 *
 * Sets up OpenTelemetry tracing so a collection run can be inspected after
 * the fact: one span per pipeline stage, one span per kubectl call, with
 * durations and failures attached.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API hands out a no-op tracer.
 *
 * Optional SDK:
 * @opentelemetry/sdk-trace-node and @opentelemetry/exporter-trace-otlp-proto are
 * optional peer dependencies loaded via optional-deps.ts. When they are absent,
 * initialization is skipped and every span call falls through to the no-op API.
 *
 * Exporter options:
 * - console (default): prints spans to stdout
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT over HTTP/protobuf
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type {
  NodeTracerProvider,
  SpanExporter,
} from "@opentelemetry/sdk-trace-node";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "cluster-collector";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/** "console" for development, "otlp" for a collector endpoint. */
const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * Only called when @opentelemetry/sdk-trace-node is available. Throws with an
 * install hint when the requested exporter needs a package that is missing.
 */
function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes so the path join never doubles them
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.log(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.log("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

let provider: NodeTracerProvider | null = null;

/**
 * Register a NodeTracerProvider when tracing is enabled and the SDK is installed.
 *
 * Spans are exported through a SimpleSpanProcessor: a collection run is a
 * short-lived CLI process, so batching would only delay export past exit.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console

    provider = new sdkTraceNode.NodeTracerProvider({
      spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(createSpanExporter())],
    });
    provider.register();

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer from the globally registered provider, or the API's
 * no-op tracer when tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Flush and shut down the tracer provider, if one was registered.
 * The CLI calls this before exiting so in-flight spans are exported.
 */
export async function shutdownTracing(): Promise<void> {
  if (!provider) return;
  try {
    await provider.shutdown();
  } catch (error) {
    console.error("[OTel] Error shutting down tracing:", error);
  }
}

export { isTracingEnabled };

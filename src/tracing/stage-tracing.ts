/**
 * stage-tracing.ts - OpenTelemetry spans around pipeline stages
 *
 * Wraps a stage of a collection run (session, enumerate, analyze, archive)
 * in an INTERNAL span named "collector.<stage>". kubectl spans started inside
 * the stage nest under it, so a trace reads as the run's timeline.
 */

import { SpanKind, SpanStatusCode, context, trace, type Span } from "@opentelemetry/api";
import { getTracer } from "./index";

/**
 * Runs a stage inside a span.
 *
 * Thrown errors are recorded on the span and rethrown. Recoverable failures
 * a stage handles itself leave the span OK; the stage can add counts through
 * the span argument.
 *
 * @param stage - Stage name, e.g. "enumerate"
 * @param attributes - Attributes set before the stage runs
 * @param handler - The stage body
 */
export async function withStageTracing<T>(
  stage: string,
  attributes: Record<string, string | number | boolean>,
  handler: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = getTracer();

  // Create span manually so we can use context.with() for proper async propagation
  const span = tracer.startSpan(`collector.${stage}`, {
    kind: SpanKind.INTERNAL,
  });
  span.setAttribute("collector.stage", stage);
  for (const [key, value] of Object.entries(attributes)) {
    span.setAttribute(key, value);
  }

  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await handler(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

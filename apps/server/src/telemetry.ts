import { Attributes, context, metrics, SpanStatusCode, trace } from "@opentelemetry/api";
import { QuoteErrorKind } from "./types";

const INSTRUMENTATION_SCOPE = "tech-stock-tracker";

export interface FetchOutcome {
  symbol: string;
  durationMs: number;
  /** Absent when the quote was fetched. */
  errorKind?: QuoteErrorKind;
}

export interface QuoteTelemetry {
  traceExecution<T>(name: string, attributes: Attributes, fn: () => Promise<T>): Promise<T>;
  recordFetch(outcome: FetchOutcome): void;
}

/**
 * Spans and metrics through the OpenTelemetry API. Without a registered SDK
 * every call is a no-op; an SDK preloaded into the process picks them up.
 */
export function createTelemetry(): QuoteTelemetry {
  const tracer = trace.getTracer(INSTRUMENTATION_SCOPE);
  const meter = metrics.getMeter(INSTRUMENTATION_SCOPE);

  const successCounter = meter.createCounter("stock_quote_fetch_success_total", {
    description: "Quotes fetched from the provider"
  });
  const failureCounter = meter.createCounter("stock_quote_fetch_failure_total", {
    description: "Quote fetches that failed after retries"
  });
  const durationHistogram = meter.createHistogram("stock_quote_fetch_duration", {
    description: "Time spent fetching one quote, retries included",
    unit: "ms"
  });

  return {
    async traceExecution<T>(name: string, attributes: Attributes, fn: () => Promise<T>): Promise<T> {
      const span = tracer.startSpan(name, { attributes });
      try {
        const result = await context.with(trace.setSpan(context.active(), span), fn);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error)
        });
        if (error instanceof Error) {
          span.recordException(error);
        }
        throw error;
      } finally {
        span.end();
      }
    },

    recordFetch({ symbol, durationMs, errorKind }) {
      durationHistogram.record(durationMs, { "stock.symbol": symbol });
      if (errorKind) {
        failureCounter.add(1, { "stock.symbol": symbol, "error.kind": errorKind });
      } else {
        successCounter.add(1, { "stock.symbol": symbol });
      }
    }
  };
}

import { Attributes, SpanStatusCode, trace } from '@opentelemetry/api';
import { describeError } from '../common/errors';

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

export function toSpanAttributes(attributes: SpanAttributes): Attributes {
  return Object.fromEntries(
    Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined),
  );
}

/**
 * Run `fn` inside an active `pii-veil` span. `describeResult` adds attributes
 * once the operation succeeds, such as how many entities it replaced; the span
 * never carries detected values.
 */
export function withSpan<T>(
  name: string,
  attributes: SpanAttributes | undefined,
  fn: () => Promise<T>,
  describeResult?: (result: T) => SpanAttributes,
): Promise<T> {
  const tracer = trace.getTracer('pii-veil');
  const attrs = attributes ? toSpanAttributes(attributes) : undefined;

  return new Promise<T>((resolve, reject) => {
    tracer.startActiveSpan(name, { attributes: attrs }, (span) => {
      fn()
        .then((result) => {
          if (describeResult) {
            span.setAttributes(toSpanAttributes(describeResult(result)));
          }
          span.setStatus({ code: SpanStatusCode.OK });
          resolve(result);
        })
        .catch((error: unknown) => {
          span.recordException(error instanceof Error ? error : String(error));
          span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
          reject(error);
        })
        .finally(() => {
          span.end();
        });
    });
  });
}

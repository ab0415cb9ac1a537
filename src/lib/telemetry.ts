import * as Sentry from "@sentry/node";

const MAX_ATTR_LENGTH = 8196;
const LOG_CHUNK_SIZE = 5000;

type Attributes = Record<string, string | number | boolean>;

function truncateAttributes(attrs?: Attributes): Attributes | undefined {
  if (!attrs) return attrs;
  const out: Attributes = {};
  for (const [k, v] of Object.entries(attrs)) {
    out[k] = typeof v === "string" && v.length > MAX_ATTR_LENGTH
      ? v.slice(0, MAX_ATTR_LENGTH) + "…[truncated]"
      : v;
  }
  return out;
}

/**
 * Wraps a function in a Sentry span for tracing.
 */
export function withSpan<T>(name: string, op: string, fn: (span: Sentry.Span) => T): T {
  return Sentry.startSpan({ name, op }, fn);
}

/**
 * Emits a structured info log to Sentry and echoes it to stderr.
 * The echo is the human-readable experiment transcript; stdout carries
 * only the JSON report.
 */
export function logInfo(message: string, attributes?: Attributes): void {
  Sentry.logger.info(message, truncateAttributes(attributes));
  process.stderr.write(`[info] ${message}${attributes ? ` ${JSON.stringify(attributes)}` : ""}\n`);
}

/**
 * Emits a structured warning log to Sentry and console.
 */
export function logWarn(message: string, attributes?: Attributes): void {
  Sentry.logger.warn(message, truncateAttributes(attributes));
  console.warn(`[warn] ${message}`, attributes ?? "");
}

/**
 * Emits a structured error log to Sentry and console.
 */
export function logError(message: string, attributes?: Attributes): void {
  Sentry.logger.error(message, truncateAttributes(attributes));
  console.error(`[error] ${message}`, attributes ?? "");
}

/**
 * Logs a long string as multiple chunked messages.
 * Each chunk is emitted as `{baseName}.1`, `.2`, etc.
 * Short strings (<=LOG_CHUNK_SIZE) emit a single log with no suffix.
 */
export function logChunked(baseName: string, value: string, attributes?: Attributes): void {
  if (value.length <= LOG_CHUNK_SIZE) {
    logInfo(`${baseName} | ${value}`, { ...attributes, chunk: 1, totalChunks: 1 });
    return;
  }

  const totalChunks = Math.ceil(value.length / LOG_CHUNK_SIZE);
  for (let i = 0; i < totalChunks; i++) {
    const chunk = value.slice(i * LOG_CHUNK_SIZE, (i + 1) * LOG_CHUNK_SIZE);
    logInfo(`${baseName}.${i + 1} | ${chunk}`, {
      ...attributes,
      chunk: i + 1,
      totalChunks,
    });
  }
}

/**
 * Like logChunked, but for structured attributes: string values longer than
 * LOG_CHUNK_SIZE are split across numbered logs, other values repeat in each.
 */
export function logChunkedAttrs(baseName: string, attributes: Attributes): void {
  const longLengths = Object.values(attributes)
    .filter((v): v is string => typeof v === "string" && v.length > LOG_CHUNK_SIZE)
    .map((v) => v.length);

  if (longLengths.length === 0) {
    logInfo(baseName, attributes);
    return;
  }

  const totalChunks = Math.ceil(Math.max(...longLengths) / LOG_CHUNK_SIZE);

  for (let i = 0; i < totalChunks; i++) {
    const chunked: Attributes = { chunk: i + 1, totalChunks };
    for (const [k, v] of Object.entries(attributes)) {
      chunked[k] = typeof v === "string" && v.length > LOG_CHUNK_SIZE
        ? v.slice(i * LOG_CHUNK_SIZE, (i + 1) * LOG_CHUNK_SIZE)
        : v;
    }
    logInfo(`${baseName}.${i + 1}`, chunked);
  }
}

/**
 * Increments a counter metric.
 */
export function countMetric(name: string, value?: number, attributes?: Record<string, string>): void {
  Sentry.metrics.count(name, value, { attributes });
}

/**
 * Records a distribution metric (e.g., latency).
 */
export function distributionMetric(
  name: string,
  value: number,
  unit: string,
  attributes?: Record<string, string>,
): void {
  Sentry.metrics.distribution(name, value, { unit, attributes });
}

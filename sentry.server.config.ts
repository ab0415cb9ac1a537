import * as Sentry from "@sentry/node";
import { config as loadDotenv } from "dotenv";

// Preloaded before the CLI, so SENTRY_DSN from the env files is read here.
loadDotenv({ path: ".env.local" });
loadDotenv();

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
  enableLogs: true,
  environment: process.env.NODE_ENV ?? "development",
  beforeSendSpan(span) {
    if (process.env.BELIEF_SHIFT_DEBUG_SPANS === "1") {
      const duration =
        span.timestamp && span.start_timestamp
          ? ((span.timestamp - span.start_timestamp) * 1000).toFixed(1)
          : "?";
      console.log(
        `[sentry] ${span.op ?? "span"} | ${span.description ?? span.span_id} | ${duration}ms | trace=${span.trace_id} | span=${span.span_id}`,
      );
    }
    return span;
  },
});

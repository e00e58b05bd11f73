import pino from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON output in production. LOG_PRETTY=true (or any non-production
// NODE_ENV) switches to the pino-pretty transport.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const isPretty =
  process.env.LOG_PRETTY === "true" || (!isProduction && !isTest);

export const log = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  base: { service: "spirit-recall" },
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname,service",
          },
        },
      }
    : {}),
});

/** Child logger tagged with the component that emits it. */
export function componentLogger(component: string) {
  return log.child({ component });
}

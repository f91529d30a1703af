/**
 * Logging
 *
 * Process-wide pino logger. Output goes to stderr through a stream that
 * masks credential-looking strings, so a config value that slips into a
 * log line is still never written verbatim.
 */

import { Writable } from "stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export type Logger = pino.Logger;

/** Field names whose values never reach a log line */
const SECRET_FIELDS = ["credentialMaterial", "clientToken", "apiKey", "password"];

const SECRET_ASSIGNMENT = new RegExp(`\\b(${SECRET_FIELDS.join("|")})\\s*=\\s*[^\\s,;]+`, "gi");
const SECRET_JSON_FIELD = new RegExp(`"(${SECRET_FIELDS.join("|")})"\\s*:\\s*"(?:[^"\\\\]|\\\\.)*"`, "gi");

/**
 * Mask secret fields in free text, as `name=value` or as a JSON member.
 */
export function redactSecrets(input: string): string {
  return input
    .replace(SECRET_JSON_FIELD, (_match, name: string) => `"${name}":"[REDACTED]"`)
    .replace(SECRET_ASSIGNMENT, (_match, name: string) => `${name}=[REDACTED]`);
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

/**
 * Build the root logger. Structured secret fields are censored by pino
 * itself; the stream masks whatever reaches a message.
 */
export function initLogger(level: string = "info", format: LogFormat = "text"): Logger {
  const options: pino.LoggerOptions = {
    level: isLogLevel(level) ? level : "info",
    name: "sheetbox",
    redact: {
      paths: SECRET_FIELDS.flatMap((field) => [field, `*.${field}`]),
      censor: "[REDACTED]",
    },
  };
  if (format === "plain") {
    // message only: no time, level, or bindings
    const plainStream = pinoPretty({
      colorize: false,
      hideObject: true,
      ignore: "time,level,pid,hostname,name,component",
      destination: redactingStderr(),
    });
    rootLogger = pino(options, plainStream);
  } else if (format === "text") {
    rootLogger = pino(options, pinoPretty({ colorize: true, destination: redactingStderr() }));
  } else {
    rootLogger = pino(options, redactingStderr());
  }
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    return initLogger(process.env.SHEETBOX_LOG_LEVEL ?? "info", "plain");
  }
  return rootLogger;
}

/**
 * Child logger tagged with a component name.
 */
export function componentLogger(component: string): Logger {
  return getLogger().child({ component });
}

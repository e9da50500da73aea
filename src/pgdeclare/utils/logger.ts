// utils/logger.ts

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warn",
  "info",
  "debug",
];

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",

  section: "\x1b[36m", // cyan
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  processing: "\x1b[35m",
  subject: "\x1b[90m", // light gray
} as const;

type Tone = "success" | "warn" | "error" | "processing";

export interface LogLine {
  tone: Tone;
  action: string;
  subject: string;
}

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

export function subject(text: string) {
  return `${colors.subject}${text}${colors.reset}`;
}

/**
 * Prints one section in the form
 *
 *   SECTION:
 *     Action: subject
 */
export function logSection(
  level: Exclude<LogLevel, "silent">,
  title: string,
  lines: readonly LogLine[]
) {
  if (!isLevelEnabled(level) || lines.length === 0) return;

  const write =
    level === "error"
      ? console.error
      : level === "warn"
        ? console.warn
        : console.log;

  write(`${colors.section}${colors.bold}${title}:${colors.reset}`);
  for (const line of lines) {
    write(
      `  ${colors[line.tone]}${line.action}:${colors.reset} ${subject(line.subject)}`
    );
  }
}

export function logStatement(
  origin: string,
  text: string,
  values?: readonly unknown[]
) {
  if (!isLevelEnabled("debug")) return;
  const params =
    values && values.length > 0
      ? ` ${JSON.stringify(values, (_key, v: unknown) =>
          typeof v === "bigint" ? v.toString() : v
        )}`
      : "";
  console.debug(
    `${colors.processing}[${origin}]${colors.reset} ${text}${subject(params)}`
  );
}

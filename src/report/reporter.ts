import chalk from "chalk";

export type ReportLevel = "heading" | "info" | "success" | "warn" | "error" | "detail";

export type ReportFields = Record<string, string | number | boolean | null>;

export interface Reporter {
  heading(message: string, fields?: ReportFields): void;
  info(message: string, fields?: ReportFields): void;
  success(message: string, fields?: ReportFields): void;
  warn(message: string, fields?: ReportFields): void;
  error(message: string, fields?: ReportFields): void;
  detail(message: string, fields?: ReportFields): void;
}

const STYLES: Record<ReportLevel, (text: string) => string> = {
  heading: (text) => chalk.cyan.bold(text),
  info: (text) => chalk.cyan(text),
  success: (text) => chalk.green(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
  detail: (text) => chalk.gray(text)
};

function formatFields(fields: ReportFields | undefined): string {
  if (!fields) return "";
  const parts = Object.entries(fields).map(([key, value]) => `${key}=${String(value)}`);
  return parts.length ? ` ${chalk.gray(parts.join(" "))}` : "";
}

export interface ConsoleReporterOptions {
  /** Drop per-file info and detail lines. */
  quiet?: boolean;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
}

export function createConsoleReporter(options: ConsoleReporterOptions = {}): Reporter {
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));

  const emit = (level: ReportLevel) => (message: string, fields?: ReportFields) => {
    if (options.quiet && (level === "info" || level === "detail")) return;
    const line = STYLES[level](message) + formatFields(fields);
    if (level === "error") writeError(line);
    else write(line);
  };

  return {
    heading: emit("heading"),
    info: emit("info"),
    success: emit("success"),
    warn: emit("warn"),
    error: emit("error"),
    detail: emit("detail")
  };
}

const noop = (): void => undefined;

export const silentReporter: Reporter = {
  heading: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  detail: noop
};

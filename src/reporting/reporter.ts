// Reporter: the leveled sink every engine component writes through.
// LogReporter feeds pino and keeps presentation lines for MCP responses;
// ConsoleReporter colours the same output for a terminal.
import type { Logger } from "pino";
import { logger } from "../logger.js";

export type ReportLevel = "error" | "warn" | "info" | "success";

export interface Reporter {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  success(message: string): void;
  /** A plain presentation line (summaries, listings). */
  print(line?: string): void;
}

export interface ReportEntry {
  readonly level: ReportLevel | "print";
  readonly message: string;
}

/** pino-backed reporter; buffers everything it is given so callers can return it. */
export class LogReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  constructor(private readonly log: Logger = logger) {}

  error(message: string): void {
    this.entries.push({ level: "error", message });
    this.log.error(message);
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
    this.log.warn(message);
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
    this.log.info(message);
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
    this.log.info({ outcome: "success" }, message);
  }

  print(line = ""): void {
    this.entries.push({ level: "print", message: line });
  }

  /** Presentation lines only, in order. */
  lines(): string[] {
    return this.entries.filter((e) => e.level === "print").map((e) => e.message);
  }
}

const colors = {
  reset: "\x1b[0m",
  red: "\x1b[0;31m",
  green: "\x1b[0;32m",
  yellow: "\x1b[0;33m",
  blue: "\x1b[0;34m",
};

/** Terminal reporter for the CLI. Info lines only appear with verbose output. */
export class ConsoleReporter implements Reporter {
  constructor(
    private readonly verbose: boolean,
    private readonly out: NodeJS.WritableStream = process.stdout,
    private readonly err: NodeJS.WritableStream = process.stderr,
  ) {}

  error(message: string): void {
    logger.error(message);
    this.err.write(`${colors.red}ERROR: ${message}${colors.reset}\n`);
  }

  warn(message: string): void {
    logger.warn(message);
    this.out.write(`${colors.yellow}WARNING: ${message}${colors.reset}\n`);
  }

  info(message: string): void {
    logger.debug(message);
    if (this.verbose) this.out.write(`${colors.blue}INFO: ${message}${colors.reset}\n`);
  }

  success(message: string): void {
    logger.info({ outcome: "success" }, message);
    this.out.write(`${colors.green}${message}${colors.reset}\n`);
  }

  print(line = ""): void {
    this.out.write(`${line}\n`);
  }

  heading(line: string): void {
    this.out.write(`${colors.blue}${line}${colors.reset}\n`);
  }
}

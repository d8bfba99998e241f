import type { ReportLevel, Reporter } from "../../src/reporting/reporter.js";

/** Keeps everything the engine reports, by level, for assertions. */
export class MemoryReporter implements Reporter {
  readonly entries: Array<{ level: ReportLevel | "print"; message: string }> = [];

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
  }

  print(line = ""): void {
    this.entries.push({ level: "print", message: line });
  }

  messages(level: ReportLevel | "print"): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

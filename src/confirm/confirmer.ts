import { createInterface, type Interface } from "node:readline";

/**
 * Yes/no decision capability. The builder asks one question per element kind
 * and the orchestrator one per restore step; who answers is up to the implementation.
 */
export interface Confirmer {
  readonly interactive: boolean;
  confirm(prompt: string, defaultYes?: boolean): Promise<boolean>;
  close(): void;
}

/** Non-interactive runs: every question is answered yes. */
export class AutoConfirmer implements Confirmer {
  readonly interactive = false;

  async confirm(): Promise<boolean> {
    return true;
  }

  close(): void {}
}

/**
 * Prompts on a stream pair and parses y/yes/n/no (case-insensitive).
 * An empty answer takes the default; anything else re-asks. End of input takes the default.
 */
export class PromptConfirmer implements Confirmer {
  readonly interactive = true;
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) waiter(line);
      else this.buffered.push(line);
    });
    this.rl.on("close", () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) waiter(null);
    });
  }

  async confirm(prompt: string, defaultYes = false): Promise<boolean> {
    const hint = defaultYes ? "[Y/n]" : "[y/N]";
    for (;;) {
      this.output.write(`${prompt} ${hint}: `);
      const line = await this.nextLine();
      if (line === null) {
        this.output.write("\n");
        return defaultYes;
      }
      const answer = line.trim().toLowerCase();
      if (answer === "") return defaultYes;
      if (answer === "y" || answer === "yes") return true;
      if (answer === "n" || answer === "no") return false;
      this.output.write("Please answer yes or no.\n");
    }
  }

  close(): void {
    this.rl.close();
  }

  private nextLine(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

import type { Confirmer } from "../../src/confirm/confirmer.js";

/** Answers questions from a fixed script and records every prompt; unscripted prompts answer `fallback`. */
export class ScriptedConfirmer implements Confirmer {
  readonly interactive = true;
  readonly prompts: string[] = [];

  constructor(
    private readonly answers: boolean[] = [],
    private readonly fallback = true,
  ) {}

  async confirm(prompt: string): Promise<boolean> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? this.fallback;
  }

  close(): void {}
}

import { createInterface, type Interface } from "node:readline/promises";
import type { Confirmer } from "./types.js";

export const CONFIRM_PROMPT =
  "Are you sure you want to delete this call log? (yes/no): ";

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === "yes";
}

/** Prompts on the terminal. Only an explicit "yes" confirms. */
export class ConsoleConfirmer<T> implements Confirmer<T> {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private rl: Interface | null = null;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.input = input;
    this.output = output;
  }

  async confirm(_record: T): Promise<boolean> {
    this.rl ??= createInterface({ input: this.input, output: this.output });
    const answer = await this.rl.question(CONFIRM_PROMPT);
    return isAffirmative(answer);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}

/** Answers without user input, from a fixed answer or a per-record rule. */
export class ScriptedConfirmer<T> implements Confirmer<T> {
  private readonly policy: boolean | ((record: T) => boolean);

  constructor(policy: boolean | ((record: T) => boolean)) {
    this.policy = policy;
  }

  async confirm(record: T): Promise<boolean> {
    return typeof this.policy === "boolean"
      ? this.policy
      : this.policy(record);
  }
}

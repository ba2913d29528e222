import { createInterface } from "node:readline/promises";
import { IPrompter } from "./IPrompter";

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

export class ReadlinePrompter implements IPrompter {
  constructor(
    private readonly input: PromptInput = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  isInteractive(): boolean {
    return Boolean(this.input.isTTY);
  }

  async pause(message: string): Promise<boolean> {
    const answer = await this.ask(`${message} `);
    return !/^\s*[qn]/i.test(answer);
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} [y/N] `);
    return /^\s*y/i.test(answer);
  }

  private async ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }
}

import { IPrompter } from "./IPrompter";

export class InMemoryPrompter implements IPrompter {
  private answers: boolean[] = [];
  private questions: string[] = [];

  constructor(private readonly interactive = true) {}

  enqueue(answer: boolean): void {
    this.answers.push(answer);
  }

  isInteractive(): boolean {
    return this.interactive;
  }

  async pause(message: string): Promise<boolean> {
    return this.next(message);
  }

  async confirm(question: string): Promise<boolean> {
    return this.next(question);
  }

  getQuestions(): string[] {
    return [...this.questions];
  }

  private next(question: string): boolean {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`InMemoryPrompter: no answer queued for "${question}"`);
    }
    return answer;
  }
}

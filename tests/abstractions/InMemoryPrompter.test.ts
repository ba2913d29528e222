import { InMemoryPrompter } from "../../src/abstractions/InMemoryPrompter";

describe("InMemoryPrompter", () => {
  it("answers in queue order and records questions", async () => {
    const prompter = new InMemoryPrompter();
    prompter.enqueue(true);
    prompter.enqueue(false);

    expect(await prompter.pause("Continue?")).toBe(true);
    expect(await prompter.confirm("Kill all of them?")).toBe(false);
    expect(prompter.getQuestions()).toEqual(["Continue?", "Kill all of them?"]);
  });

  it("reports whether it is interactive", () => {
    expect(new InMemoryPrompter().isInteractive()).toBe(true);
    expect(new InMemoryPrompter(false).isInteractive()).toBe(false);
  });

  it("rejects when no answer is queued", async () => {
    await expect(new InMemoryPrompter().confirm("Sure?")).rejects.toThrow(
      'InMemoryPrompter: no answer queued for "Sure?"'
    );
  });
});

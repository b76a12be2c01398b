import { describe, it, expect } from "@jest/globals";
import { PassThrough } from "stream";
import { choose, createPrompter, type Prompter } from "../../src/cli/prompt";

function streams(): { input: PassThrough; output: PassThrough; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  let text = "";
  output.on("data", (chunk: Buffer) => {
    text += chunk.toString("utf-8");
  });
  return { input, output, written: () => text };
}

describe("createPrompter", () => {
  it("returns the trimmed answer and shows the default", async () => {
    const { input, output, written } = streams();
    const prompter = createPrompter(input, output);

    const answer = prompter.ask("Username", "hydra");
    input.write("  alice  \n");

    expect(await answer).toBe("alice");
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(written()).toBe("Username (hydra): ");
  });

  it("falls back to the default on an empty line", async () => {
    const { input, output } = streams();
    const prompter = createPrompter(input, output);

    const answer = prompter.ask("Threads", "40");
    input.write("\n");

    expect(await answer).toBe("40");
  });

  it("resolves to null once input is closed", async () => {
    const { input, output } = streams();
    const prompter = createPrompter(input, output);

    const answer = prompter.ask("Username");
    input.end();

    expect(await answer).toBeNull();
    expect(await prompter.ask("Again")).toBeNull();
  });
});

describe("choose", () => {
  it("asks again until the answer is one of the choices", async () => {
    const answers = ["x", "M"];
    const prompter: Prompter = {
      ask: async () => answers.shift() ?? null,
    };

    expect(await choose(prompter, "Next", ["n", "m", "q"], "n")).toBe("m");
    expect(answers).toEqual([]);
  });
});

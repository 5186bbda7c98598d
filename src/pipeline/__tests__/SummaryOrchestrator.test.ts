import fs from "fs/promises";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SummaryOrchestrator, chunkText } from "../SummaryOrchestrator.js";
import type { ChatCompleter } from "../../llm/OpenAIChatClient.js";
import type { SummarizeActConfig } from "../../jobs/summarize-act/config.js";
import { PathsConfig, type PipelinePaths } from "../../config/paths.js";
import { MissingInputError, SummarizerError } from "../../utils/errors.js";

const config: SummarizeActConfig = {
  actTitle: "Test Act 2025",
  chunkMaxChars: 1200,
  chunkMaxTokens: 400,
  reduceMaxTokens: 800,
  retries: 3,
  retryBackoff: 2,
  chunkDelayMs: 500,
};

/**
 * Answers chunk prompts with numbered bullets and the reduce prompt with FINAL
 */
class FakeCompleter implements ChatCompleter {
  calls: Array<{ prompt: string; maxTokens: number }> = [];
  failOnCall: number | null = null;
  private chunkAnswers = 0;

  async complete(prompt: string, maxTokens: number): Promise<string> {
    this.calls.push({ prompt, maxTokens });
    if (this.failOnCall === this.calls.length) {
      throw new SummarizerError("model unavailable");
    }
    if (prompt.startsWith("You are summarising")) {
      this.chunkAnswers++;
      return `bullets-${this.chunkAnswers}`;
    }
    return "FINAL";
  }
}

describe("chunkText", () => {
  it("slices text into fixed-size chunks", () => {
    expect(chunkText("abcdefg", 3)).toEqual(["abc", "def", "g"]);
    expect(chunkText("abc", 3)).toEqual(["abc"]);
    expect(chunkText("", 3)).toEqual([]);
  });

  it("never ends a chunk on half of a 4-byte character", () => {
    expect(chunkText("ab\u{1F600}cd", 3)).toEqual(["ab\u{1F600}", "cd"]);
  });

  it("rejects a non-positive size", () => {
    expect(() => chunkText("abc", 0)).toThrow(RangeError);
  });
});

describe("SummaryOrchestrator", () => {
  let dir: string;
  let paths: PipelinePaths;
  let waits: number[];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "summarize-act-"));
    paths = PathsConfig.resolve("data/test-act.pdf", path.join(dir, "outputs"));
    waits = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeSections(texts: string[]): Promise<void> {
    await fs.mkdir(path.dirname(paths.sectionsFile), { recursive: true });
    await fs.writeFile(
      paths.sectionsFile,
      JSON.stringify({ sections: texts.map((text, i) => ({ title: `Section ${i + 1}`, text })) }),
      "utf-8"
    );
  }

  it("summarises each chunk then combines the bullets", async () => {
    await writeSections(["a".repeat(1000), "b".repeat(498)]);
    const completer = new FakeCompleter();

    const result = await new SummaryOrchestrator({ paths, completer, config, sleep }).run();

    expect(result).toEqual({ summary_text: "FINAL" });
    expect(JSON.parse(await fs.readFile(paths.summaryFile, "utf-8"))).toEqual({
      summary_text: "FINAL",
    });
    expect(existsSync(paths.summaryCheckpointFile)).toBe(false);

    expect(completer.calls.map((c) => c.maxTokens)).toEqual([400, 400, 800]);
    expect(completer.calls[0].prompt).toContain("You are summarising a chunk of the Test Act 2025.");
    expect(completer.calls[0].prompt).toContain(`CHUNK 1/2:\n\n${"a".repeat(1000)}\n\n${"b".repeat(198)}`);
    expect(completer.calls[1].prompt.endsWith(`CHUNK 2/2:\n\n${"b".repeat(300)}`)).toBe(true);
    expect(completer.calls[2].prompt.endsWith("bullets-1\n\nbullets-2")).toBe(true);
    expect(waits).toEqual([500, 500]);
  });

  it("resumes after the chunks saved by an earlier run", async () => {
    await writeSections(["a".repeat(1500)]);
    await fs.writeFile(
      paths.summaryCheckpointFile,
      JSON.stringify({ intermediate: ["earlier bullets"] }),
      "utf-8"
    );
    const completer = new FakeCompleter();

    await new SummaryOrchestrator({ paths, completer, config, sleep }).run();

    expect(completer.calls).toHaveLength(2);
    expect(completer.calls[0].prompt).toContain("CHUNK 2/2:");
    expect(completer.calls[1].prompt.endsWith("earlier bullets\n\nbullets-1")).toBe(true);
  });

  it("starts over when the checkpoint cannot be read", async () => {
    await writeSections(["a".repeat(1500)]);
    await fs.writeFile(paths.summaryCheckpointFile, "{ truncated", "utf-8");
    const completer = new FakeCompleter();

    await new SummaryOrchestrator({ paths, completer, config, sleep }).run();

    expect(completer.calls).toHaveLength(3);
    expect(completer.calls[0].prompt).toContain("CHUNK 1/2:");
  });

  it("saves finished chunks when a chunk call fails", async () => {
    await writeSections(["a".repeat(3000)]);
    const completer = new FakeCompleter();
    completer.failOnCall = 2;

    await expect(
      new SummaryOrchestrator({ paths, completer, config, sleep }).run()
    ).rejects.toThrow("model unavailable");

    expect(JSON.parse(await fs.readFile(paths.summaryCheckpointFile, "utf-8"))).toEqual({
      intermediate: ["bullets-1"],
    });
    expect(existsSync(paths.summaryFile)).toBe(false);
  });

  it("keeps the checkpoint when the reduce call fails", async () => {
    await writeSections(["a".repeat(100)]);
    const completer = new FakeCompleter();
    completer.failOnCall = 2;

    await expect(
      new SummaryOrchestrator({ paths, completer, config, sleep }).run()
    ).rejects.toBeInstanceOf(SummarizerError);

    expect(JSON.parse(await fs.readFile(paths.summaryCheckpointFile, "utf-8"))).toEqual({
      intermediate: ["bullets-1"],
    });
  });

  it("refuses to summarise empty sections", async () => {
    await writeSections(["   ", ""]);
    const completer = new FakeCompleter();

    await expect(
      new SummaryOrchestrator({ paths, completer, config, sleep }).run()
    ).rejects.toThrow("Extracted sections appear empty.");
    expect(completer.calls).toHaveLength(0);
  });

  it("fails when the sections file is missing", async () => {
    await expect(
      new SummaryOrchestrator({ paths, completer: new FakeCompleter(), config, sleep }).run()
    ).rejects.toBeInstanceOf(MissingInputError);
  });
});

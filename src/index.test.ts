import { afterEach, describe, expect, it } from "vitest";
import { readdir, readFile, rm } from "fs/promises";
import path from "node:path";
import { train } from "./index";
import { Logger } from "./utils/logger";
import { createTestLayout } from "./testing/context";
import type { TestLayout } from "./testing/context";
import { FakeCommandRunner } from "./testing/fake-command-runner";
import type { CommandRunner } from "./utils/run-command";
import type { PartialTrainingConfig } from "./types";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("train", () => {
  let layout: TestLayout | undefined;

  afterEach(async () => {
    if (layout) await rm(layout.root, { recursive: true, force: true });
    layout = undefined;
  });

  function configFor(dirs: TestLayout, overrides: PartialTrainingConfig = {}): PartialTrainingConfig {
    return {
      ...overrides,
      paths: {
        langdataDir: dirs.langdataDir,
        tessdataDir: dirs.tessdataDir,
        tmpDir: dirs.tmpDir,
        outputDir: dirs.outputDir,
      },
    };
  }

  it("produces training data for English with two fonts", async () => {
    layout = await createTestLayout("eng");
    const runner = new FakeCommandRunner();

    const code = await train({
      lang: "eng",
      config: configFor(layout, {
        rendering: { fonts: ["Arial", "Courier New"], maxPages: 2 },
      }),
      environment: { webtextPrefix: "", meanCount: -1 },
      runner,
      logger: new Logger({ quiet: true }),
    });

    expect(code).toBe(0);
    const out = layout.outputDir;
    expect((await readdir(out)).sort()).toEqual([
      "eng",
      "eng.Arial.exp0.lstmf",
      "eng.Courier_New.exp0.lstmf",
      "eng.training_files.txt",
    ]);
    expect((await readdir(path.join(out, "eng"))).sort()).toEqual([
      "eng.traineddata",
      "eng.unicharset",
    ]);
    expect(await readFile(path.join(out, "eng.training_files.txt"), "utf-8")).toBe(
      `${path.join(out, "eng.Arial.exp0.lstmf")}\n${path.join(out, "eng.Courier_New.exp0.lstmf")}\n`,
    );
    expect(runner.callsTo("text2image")[1].args).toContain("--max_pages=2");
    // Scratch directory and font cache are gone
    expect(await readdir(layout.tmpDir)).toEqual([]);
  });

  it("returns 1 and relocates nothing when a font fails", async () => {
    layout = await createTestLayout("eng");
    const runner = new FakeCommandRunner({ failFonts: ["Broken Font"] });

    const code = await train({
      lang: "eng",
      config: configFor(layout, {
        rendering: { fonts: ["Arial", "Verdana", "Broken Font"] },
      }),
      environment: { webtextPrefix: "", meanCount: -1 },
      runner,
      logger: new Logger({ quiet: true }),
    });

    expect(code).toBe(1);
    expect(runner.callsTo("tesseract")).toEqual([]);
    expect(runner.callsTo("combine_lang_model")).toEqual([]);
    await expect(readdir(layout.outputDir)).rejects.toThrow();
    expect(await readdir(layout.tmpDir)).toEqual([]);
  });

  it("returns 1 for an invalid language code", async () => {
    layout = await createTestLayout("xyz");
    const runner = new FakeCommandRunner();

    const code = await train({
      lang: "xyz",
      config: configFor(layout),
      environment: { webtextPrefix: "", meanCount: -1 },
      runner,
      logger: new Logger({ quiet: true }),
    });

    expect(code).toBe(1);
    expect(runner.calls).toEqual([]);
    expect(await readdir(layout.tmpDir)).toEqual([]);
  });

  it("lets running units finish before removing the scratch directory", async () => {
    layout = await createTestLayout("eng");
    const dirs = layout;
    const fake = new FakeCommandRunner({ failFonts: ["Broken"] });
    const events: string[] = [];
    const runner: CommandRunner = {
      async run(tool, args, options) {
        const rendersSlowFont =
          tool === "text2image" &&
          args.includes("--font=Slow") &&
          args.some((arg) => arg.startsWith("--max_pages="));
        if (!rendersSlowFont) return fake.run(tool, args, options);

        await sleep(100);
        await fake.run(tool, args, options);
        events.push("slow unit finished");
      },
    };

    const code = await train({
      lang: "eng",
      config: configFor(dirs, {
        rendering: { fonts: ["Slow", "Broken"] },
        workers: { images: 2 },
      }),
      environment: { webtextPrefix: "", meanCount: -1 },
      runner,
      logger: new Logger({ quiet: true }),
    });
    events.push(`train returned ${code}`);

    expect(events).toEqual(["slow unit finished", "train returned 1"]);
    expect(await readdir(dirs.tmpDir)).toEqual([]);
  });

  it("returns 1 when the configuration cannot be read", async () => {
    const runner = new FakeCommandRunner();
    const config: PartialTrainingConfig = {
      get paths(): never {
        throw new Error("unreadable config");
      },
    };

    const code = await train({
      lang: "eng",
      config,
      environment: { webtextPrefix: "", meanCount: -1 },
      runner,
      logger: new Logger({ quiet: true }),
    });

    expect(code).toBe(1);
    expect(runner.calls).toEqual([]);
  });
});

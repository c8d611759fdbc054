import { afterEach, describe, expect, it } from "vitest";
import { readFile, readdir, rm, writeFile } from "fs/promises";
import path from "node:path";
import { makeLstmData } from "./lstmdata";
import { applyLanguageParameters } from "./parameters";
import { createTestContext } from "../testing/context";
import type { TestLayout } from "../testing/context";
import type { PartialTrainingConfig } from "../types";

describe("LSTM data assembly", () => {
  let layout: TestLayout | undefined;

  afterEach(async () => {
    if (layout) await rm(layout.root, { recursive: true, force: true });
    layout = undefined;
  });

  async function withArtifacts(lang: string, overrides: PartialTrainingConfig = {}) {
    const test = await createTestContext(lang, overrides);
    layout = test.layout;
    applyLanguageParameters(test.ctx);
    const dir = test.ctx.run.trainingDir;
    for (const font of ["Arial", "Verdana"]) {
      for (const ext of ["box", "tif", "lstmf"]) {
        await writeFile(path.join(dir, `${lang}.${font}.exp0.${ext}`), ext);
      }
    }
    await writeFile(path.join(dir, `${lang}.unicharset`), "3\n");
    return test;
  }

  it("builds the starter traineddata", async () => {
    const { ctx, runner } = await withArtifacts("eng");

    await makeLstmData(ctx);

    const prefix = path.join(ctx.run.langdataDir, "eng", "eng");
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].tool).toBe("combine_lang_model");
    expect(runner.calls[0].args).toEqual([
      "--input_unicharset",
      path.join(ctx.run.trainingDir, "eng.unicharset"),
      "--script_dir",
      ctx.run.langdataDir,
      "--words",
      `${prefix}.wordlist`,
      "--numbers",
      `${prefix}.numbers`,
      "--puncs",
      `${prefix}.punc`,
      "--output_dir",
      ctx.run.outputDir,
      "--lang",
      "eng",
    ]);
    expect((await readdir(path.join(ctx.run.outputDir, "eng"))).sort()).toEqual([
      "eng.traineddata",
      "eng.unicharset",
    ]);
  });

  it("marks right-to-left languages and passes the recoder through", async () => {
    const { ctx, runner } = await withArtifacts("ara");

    await makeLstmData(ctx);

    expect(runner.calls[0].args.slice(-2)).toEqual(["--lang_is_rtl", "--pass_through_recoder"]);
  });

  it("moves the feature files and writes the manifest", async () => {
    const { ctx } = await withArtifacts("eng");

    await makeLstmData(ctx);

    const out = ctx.run.outputDir;
    const manifest = path.join(out, "eng.training_files.txt");
    expect(ctx.manifestFile).toBe(manifest);
    expect(await readFile(manifest, "utf-8")).toBe(
      `${path.join(out, "eng.Arial.exp0.lstmf")}\n${path.join(out, "eng.Verdana.exp0.lstmf")}\n`,
    );
    const left = await readdir(ctx.run.trainingDir);
    expect(left.filter((f) => f.endsWith(".lstmf"))).toEqual([]);
    expect(left.filter((f) => f.endsWith(".box"))).toHaveLength(2);
  });

  it("keeps box/tif pairs when asked to", async () => {
    const { ctx } = await withArtifacts("eng", { output: { saveBoxTiff: true } });

    await makeLstmData(ctx);

    const moved = (await readdir(ctx.run.outputDir)).filter((f) => f.startsWith("eng.")).sort();
    expect(moved).toEqual([
      "eng.Arial.exp0.box",
      "eng.Arial.exp0.lstmf",
      "eng.Arial.exp0.tif",
      "eng.Verdana.exp0.box",
      "eng.Verdana.exp0.lstmf",
      "eng.Verdana.exp0.tif",
      "eng.training_files.txt",
    ]);
  });

  it("writes no manifest when the combiner fails", async () => {
    const test = await createTestContext("eng", {}, { failTools: ["combine_lang_model"] });
    layout = test.layout;
    applyLanguageParameters(test.ctx);

    await expect(makeLstmData(test.ctx)).rejects.toThrow(
      "Program combine_lang_model failed with return code 1. Abort.",
    );
    expect(test.ctx.manifestFile).toBeUndefined();
    expect(await readdir(test.ctx.run.outputDir)).toEqual([]);
  });
});

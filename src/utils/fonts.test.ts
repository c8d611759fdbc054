import { afterEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { FONTS, VERTICAL_FONTS, loadFontTable } from "./fonts";

describe("font table", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads the bundled per-script lists", () => {
    expect(FONTS.latin).toHaveLength(32);
    expect(FONTS.latin[0]).toBe("Arial Bold");
    expect(FONTS.russian.slice(0, 2)).toEqual(["Arial Bold", "Arial Bold Italic"]);
  });

  it("lists the fonts rendered top to bottom", () => {
    expect(VERTICAL_FONTS).toEqual([
      "TakaoExGothic",
      "TakaoExMincho",
      "AR PL UKai Patched",
      "AR PL UMing Patched Light",
      "Baekmuk Batang Patched",
    ]);
  });

  it("rejects a table with a missing family", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "fonts-"));
    const file = path.join(dir, "fonts.json");
    await writeFile(file, JSON.stringify({ latin: ["Arial"] }));

    expect(() => loadFontTable(file)).toThrow();
  });
});

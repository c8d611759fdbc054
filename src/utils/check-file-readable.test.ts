import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { chmod, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { checkFileReadable } from "./check-file-readable";
import { MissingArtifactError, UnreadableArtifactError } from "./errors";

describe("checkFileReadable", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "check-readable-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns true when every file opens", async () => {
    const a = path.join(dir, "a.box");
    const b = path.join(dir, "a.tif");
    await writeFile(a, "box");
    await writeFile(b, "tif");

    await expect(checkFileReadable(a, b)).resolves.toBe(true);
  });

  it("returns true for an empty list", async () => {
    await expect(checkFileReadable()).resolves.toBe(true);
  });

  it("fails on the first missing file with its path in the message", async () => {
    const present = path.join(dir, "present.txt");
    const missing = path.join(dir, "missing.txt");
    await writeFile(present, "x");

    const error = await checkFileReadable(present, missing).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MissingArtifactError);
    expect(error).toHaveProperty(
      "message",
      `Required/expected file '${missing}' does not exist`,
    );
    expect(error).toHaveProperty("code", "MissingArtifact");
  });

  it("reports an unreadable file", async () => {
    // Root can read anything regardless of mode bits
    if (process.getuid?.() === 0) return;

    const locked = path.join(dir, "locked.txt");
    await writeFile(locked, "x");
    await chmod(locked, 0o000);

    const error = await checkFileReadable(locked).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UnreadableArtifactError);
    expect(error).toHaveProperty("message", `${locked} is not readable`);
  });

  it("reports other IO errors with their message", async () => {
    await writeFile(path.join(dir, "file.txt"), "x");
    // A path through a regular file fails with ENOTDIR
    const inside = path.join(dir, "file.txt", "child");

    const error = await checkFileReadable(inside).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UnreadableArtifactError);
    expect(error).toHaveProperty(
      "message",
      `${inside} IO Error: ENOTDIR: not a directory, open '${inside}'`,
    );
  });
});

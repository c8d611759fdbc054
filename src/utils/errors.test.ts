import { describe, expect, it } from "vitest";
import {
  getErrorCode,
  InvalidLanguageCodeError,
  isPipelineError,
  PipelineError,
  ToolExecutionFailedError,
  ToolNotFoundError,
  UnreadableArtifactError,
} from "./errors";

describe("pipeline errors", () => {
  it("carries a code and the subclass name", () => {
    const error = new ToolNotFoundError("text2image");
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.code).toBe("ToolNotFound");
    expect(error.name).toBe("ToolNotFoundError");
    expect(error.message).toBe("text2image not found");
  });

  it("formats a failed tool run", () => {
    const error = new ToolExecutionFailedError("tesseract", 2, "bad image");
    expect(error.message).toBe("Program tesseract failed with return code 2. Abort.");
    expect(error.output).toBe("bad image");
  });

  it("formats an IO failure with the cause's message", () => {
    const error = new UnreadableArtifactError("/tmp/a.box", "io", new Error("EIO: i/o error"));
    expect(error.message).toBe("/tmp/a.box IO Error: EIO: i/o error");
  });

  it("formats an invalid language code", () => {
    expect(new InvalidLanguageCodeError("xx").message).toBe(
      "Error: xx is not a valid language code",
    );
  });

  it("tells pipeline errors from others", () => {
    expect(isPipelineError(new InvalidLanguageCodeError("xx"))).toBe(true);
    expect(isPipelineError(new Error("plain"))).toBe(false);
  });

  it("reads system error codes", () => {
    expect(getErrorCode(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(getErrorCode(new Error("plain"))).toBeUndefined();
    expect(getErrorCode("ENOENT")).toBeUndefined();
  });
});

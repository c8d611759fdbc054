import { describe, expect, it } from "vitest";
import { readResolverEnvironment } from "./environment";

describe("readResolverEnvironment", () => {
  it("defaults to no prefix and no mean count override", () => {
    expect(readResolverEnvironment({})).toEqual({ webtextPrefix: "", meanCount: -1 });
  });

  it("reads both overrides", () => {
    expect(
      readResolverEnvironment({ FLAGS_webtext_prefix: "/corpora", FLAGS_mean_count: "25" }),
    ).toEqual({ webtextPrefix: "/corpora", meanCount: 25 });
  });

  it("treats empty values as unset", () => {
    expect(readResolverEnvironment({ FLAGS_webtext_prefix: "", FLAGS_mean_count: "" })).toEqual({
      webtextPrefix: "",
      meanCount: -1,
    });
  });

  it("rejects a mean count that is not an integer", () => {
    expect(() => readResolverEnvironment({ FLAGS_mean_count: "many" })).toThrow();
  });
});

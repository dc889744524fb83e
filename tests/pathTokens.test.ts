import { describe, it, expect } from "vitest";
import { splitAlternatives, substitutePlaceholders, translateStdioPath } from "../src/gridengine/pathTokens.js";

describe("splitAlternatives", () => {
  it("splits on unescaped commas", () => {
    expect(splitAlternatives("a,b\\,c,d")).toEqual(["a", "b,c", "d"]);
    expect(splitAlternatives("single")).toEqual(["single"]);
  });
});

describe("substitutePlaceholders", () => {
  it("rewrites bare and braced placeholders", () => {
    expect(substitutePlaceholders("$HOME/logs/$JOB_NAME.$JOB_ID.$TASK_ID")).toBe("$HOME/logs/%x.%j.%a");
    expect(substitutePlaceholders("/tmp/${USER}_${HOSTNAME}.log")).toBe("/tmp/%u_%N.log");
  });

  it("leaves longer variable names alone", () => {
    expect(substitutePlaceholders("$USERNAME/$JOB_IDX")).toBe("$USERNAME/$JOB_IDX");
  });
});

describe("translateStdioPath", () => {
  it("uses the first alternative without a host", () => {
    expect(translateStdioPath("out.log")).toEqual({ path: "out.log", skipped: [] });
    expect(translateStdioPath(":/data/$USER.out")).toEqual({ path: "/data/%u.out", skipped: [] });
  });

  it("skips host-qualified alternatives", () => {
    expect(translateStdioPath("node1:/a.out,node2:/b.out,/c.out")).toEqual({
      path: "/c.out",
      skipped: ["node1:/a.out", "node2:/b.out"]
    });
    expect(translateStdioPath("node1:/a.out")).toEqual({ path: null, skipped: ["node1:/a.out"] });
  });
});

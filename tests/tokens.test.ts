import { describe, it, expect } from "vitest";
import { scanBoolean, scanInteger, scanMemory, scanTime } from "../src/gridengine/tokens.js";

describe("scanMemory", () => {
  it("scales binary and decimal units and rounds up to MiB", () => {
    expect(scanMemory("2G", 0)?.value).toBe(2048);
    expect(scanMemory("512M", 0)?.value).toBe(512);
    expect(scanMemory("1536K", 0)?.value).toBe(2);
    expect(scanMemory("1g", 0)?.value).toBe(954);
    expect(scanMemory("1m", 0)?.value).toBe(1);
    expect(scanMemory("1048577", 0)?.value).toBe(2);
  });

  it("raises positive values below the floor", () => {
    expect(scanMemory("100M", 1024)?.value).toBe(1024);
    expect(scanMemory("4G", 1024)?.value).toBe(4096);
    expect(scanMemory("0", 1024)?.value).toBe(0);
  });

  it("rejects non-numeric input and trailing garbage", () => {
    expect(scanMemory("G", 0)).toBeNull();
    expect(scanMemory("", 0)).toBeNull();
    expect(scanMemory("2GB", 0)).toBeNull();
    expect(scanMemory("2T", 0)).toBeNull();
  });

  it("reads only the given span", () => {
    expect(scanMemory("mem=3G,x", 0, 4, 6)).toEqual({ value: 3072, end: 6 });
  });
});

describe("scanTime", () => {
  it("converts H:M:S to minutes, rounding up", () => {
    expect(scanTime("01:30:00")?.value).toBe(90);
    expect(scanTime("0:0:1")?.value).toBe(1);
    expect(scanTime("1::1")?.value).toBe(61);
    expect(scanTime("::")?.value).toBe(0);
  });

  it("treats a bare number as seconds", () => {
    expect(scanTime("3600")?.value).toBe(60);
    expect(scanTime("61")?.value).toBe(2);
  });

  it("rejects other colon layouts and overflow", () => {
    expect(scanTime("1:30")).toBeNull();
    expect(scanTime("1:2:3:4")).toBeNull();
    expect(scanTime("1:x:3")).toBeNull();
    expect(scanTime("257698037761")).toBeNull();
  });
});

describe("scanInteger", () => {
  it("parses a signed prefix", () => {
    expect(scanInteger("-42abc")).toEqual({ value: -42, end: 3 });
    expect(scanInteger("+7")).toEqual({ value: 7, end: 2 });
    expect(scanInteger("abc")).toBeNull();
    expect(scanInteger("-")).toBeNull();
  });
});

describe("scanBoolean", () => {
  it("accepts exactly TRUE/FALSE/1/0 in any case", () => {
    expect(scanBoolean("TRUE")?.value).toBe(true);
    expect(scanBoolean("true")?.value).toBe(true);
    expect(scanBoolean("False")?.value).toBe(false);
    expect(scanBoolean("1")?.value).toBe(true);
    expect(scanBoolean("0")?.value).toBe(false);
  });

  it("distinguishes invalid from false", () => {
    expect(scanBoolean("truex")).toBeNull();
    expect(scanBoolean("yes")).toBeNull();
    expect(scanBoolean("")).toBeNull();
  });
});

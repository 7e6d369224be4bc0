import * as path from "node:path";
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { buildVideoConfig } from "../../src/schema/config.js";
import { renderErrorKind } from "../helpers.js";

describe("buildVideoConfig", () => {
  it("fills defaults and derives overlap", () => {
    const config = buildVideoConfig({});
    expect(config.screen).toEqual([1920, 1080]);
    expect(config.fps).toBe(60);
    expect(config.backColor).toBe("white");
    expect(config.coverSec).toBe(4);
    expect(config.endingSec).toBe(4);
    expect(config.swipePixelsPerSec).toBe(160);
    expect(config.slideWidth).toBe(480);
    expect(config.step).toBe(20);
    expect(config.overlap).toBe(4);
    expect(config.workDir).toBe(path.resolve("work"));
    expect(config.savePath).toBe(path.join(path.resolve("work"), "output"));
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(buildVideoConfig())).toBe(true);
  });

  it("derives savePath from an explicit workDir", () => {
    const config = buildVideoConfig({ workDir: "/tmp/frames" });
    expect(config.savePath).toBe(path.join("/tmp/frames", "output"));
  });

  it("rejects a screen width that is not a multiple of the slide width", () => {
    expect(renderErrorKind(() => buildVideoConfig({ slideWidth: 500 }))).toBe("InvalidConfig");
  });

  it("requires step to exceed overlap", () => {
    expect(renderErrorKind(() => buildVideoConfig({ step: 4 }))).toBe("InvalidConfig");
    expect(buildVideoConfig({ step: 5 }).step).toBe(5);
  });

  it("parses the separator color", () => {
    expect(buildVideoConfig({ separatorColor: "black" }).separatorColor).toEqual([0, 0, 0]);
  });

  it("throws ZodError on malformed fields", () => {
    expect(() => buildVideoConfig({ fps: -1 })).toThrow(ZodError);
    expect(() => buildVideoConfig({ screen: [1920] })).toThrow(ZodError);
  });
});

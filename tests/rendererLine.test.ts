import { classifyLine } from "../src/core/protocol/RendererLine.js";

describe("classifyLine", () => {
  test("should ignore blank lines", () => {
    expect(classifyLine("")).toBeNull();
    expect(classifyLine("   \t ")).toBeNull();
  });

  describe("Auto-orientation lines", () => {
    test("should parse axis and offset", () => {
      expect(classifyLine("[AUTO] axis=X offset=90.5")).toEqual({
        kind: "auto-orientation",
        line: "[AUTO] axis=X offset=90.5",
        axis: "X",
        offset: 90.5,
      });
    });

    test("should accept a lowercase axis without an offset", () => {
      expect(classifyLine("[AUTO] axis=y")).toEqual({
        kind: "auto-orientation",
        line: "[AUTO] axis=y",
        axis: "Y",
        offset: undefined,
      });
    });

    test("should drop auto lines with nothing usable", () => {
      expect(classifyLine("[AUTO] axis=W offset=abc")).toBeNull();
      expect(classifyLine("[AUTO] choosing orientation")).toBeNull();
    });
  });

  describe("Frame progress lines", () => {
    test("should take the first all-digit token", () => {
      expect(classifyLine("Fra:12 Mem:34.5M | Time:00:03.21")).toEqual({
        kind: "frame-progress",
        line: "Fra:12 Mem:34.5M | Time:00:03.21",
        frame: 12,
      });
    });

    test("should tolerate a space after the marker", () => {
      expect(classifyLine("Fra: 7 | Rendering")).toEqual({
        kind: "frame-progress",
        line: "Fra: 7 | Rendering",
        frame: 7,
      });
    });

    test("should treat a marker without a number as status text", () => {
      expect(classifyLine("Fra:abc")).toEqual({ kind: "status-text", line: "Fra:abc" });
    });
  });

  test("should pass other lines through trimmed", () => {
    expect(classifyLine("  Saved: /tmp/out.mp4  \r")).toEqual({
      kind: "status-text",
      line: "Saved: /tmp/out.mp4",
    });
  });
});

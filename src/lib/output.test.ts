import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { Output } from "./output.js";

describe("Output", () => {
  let output: Output;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe("verbose mode", () => {
    beforeEach(() => {
      output = new Output({ verbose: true });
    });

    it("info logs in verbose mode", () => {
      output.info("Test message");
      expect(consoleSpy).toHaveBeenCalled();
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Test message");
    });

    it("diagnostic echoes the line", () => {
      output.diagnostic("[2026-01-01 00:00:00] API GET: /projects");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("API GET: /projects");
    });

    it("progress shows done and total", () => {
      output.progress("Loading", 3, 10);
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Loading: 3/10");
    });
  });

  describe("non-verbose mode", () => {
    beforeEach(() => {
      output = new Output({ verbose: false });
    });

    it("info does not log", () => {
      output.info("Test message");
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it("diagnostic does not log", () => {
      output.diagnostic("line");
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it("progress does not log", () => {
      output.progress("Loading", 1);
      expect(consoleSpy).not.toHaveBeenCalled();
    });
  });

  describe("always visible methods", () => {
    beforeEach(() => {
      output = new Output({ verbose: false });
    });

    it("success always logs", () => {
      output.success("Success message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Success message");
    });

    it("warn always logs", () => {
      output.warn("Warning message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Warning message");
    });

    it("error always logs", () => {
      output.error("Error message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Error message");
    });

    it("header includes the title", () => {
      output.header("Projects");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Projects");
    });

    it("lines prints each line as is", () => {
      output.lines("a\nb");
      output.lines(["c"]);
      expect(consoleSpy.mock.calls).toEqual([["a"], ["b"], ["c"]]);
    });

    it("field pads the label", () => {
      output.field("Type", "PartDefinition");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Type:");
      expect(calls).toContain("PartDefinition");
    });

    it("summary reports elapsed time", () => {
      output.summary("Done");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toMatch(/Done in \d+\.\ds\./);
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Backtrace, ContextTrace, config } from "../index.js";

describe("context trace", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  describe("messages", () => {
    it("keeps push order", () => {
      const trace = new ContextTrace();
      trace.push("first");
      trace.pushWith(() => "second");
      expect(trace.messages).toEqual(["first", "second"]);
      expect(trace.isEmpty).toBe(false);
    });

    it("renders the Context block", () => {
      const trace = new ContextTrace();
      trace.push("From func2");
      trace.push("From func3");
      expect(trace.renderContext()).toBe("\n\nContext:\n\t- From func2\n\t- From func3");
    });

    it("renders nothing without messages", () => {
      expect(new ContextTrace().renderContext()).toBe("");
    });

    it("ignores pushes when context is switched off", () => {
      config.set({ context: false });
      const trace = new ContextTrace();
      let built = false;
      trace.push("dropped");
      trace.pushWith(() => {
        built = true;
        return "dropped";
      });
      expect(trace.isEmpty).toBe(true);
      expect(built).toBe(false);
    });
  });

  describe("backtrace", () => {
    it("is disabled by default", () => {
      const trace = new ContextTrace();
      expect(trace.backtrace.status).toBe("disabled");
      expect(trace.backtrace.frames).toEqual([]);
      expect(trace.renderBacktrace()).toBe("");
    });

    it("captures frames when enabled", () => {
      config.set({ backtrace: true });
      const backtrace = Backtrace.capture();
      expect(backtrace.isCaptured).toBe(true);
      expect(backtrace.frames.length).toBeGreaterThan(0);
      expect(backtrace.frames[0]).toMatch(/^at /);
    });

    it("renders the Backtrace block when captured", () => {
      config.set({ backtrace: true });
      const trace = new ContextTrace();
      expect(trace.renderBacktrace()).toBe(`\n\nBacktrace:\n${trace.backtrace.frames.join("\n")}`);
    });
  });
});

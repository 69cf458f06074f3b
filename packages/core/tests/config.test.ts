/**
 * Tests for the layered configuration
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config, defineConfig, loadConfigFromEnv } from "@unionerr/core";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    delete process.env.UNIONERR_BACKTRACE;
    delete process.env.UNIONERR_CONTEXT;
    config.reset();
  });

  describe("defaults", () => {
    it("should start with debug and backtraces off", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("backtrace")).toBe(false);
    });

    it("should record context and show it in display by default", () => {
      expect(config.get("context")).toBe(true);
      expect(config.get("render.displayContext")).toBe(true);
    });

    it("should return undefined for unknown paths", () => {
      expect(config.get("render.colors")).toBeUndefined();
      expect(config.get("nope.deeper")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });

    it("should not find a config file in the workspace", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
    });
  });

  describe("set()", () => {
    it("should override a flag", () => {
      config.set({ backtrace: true });
      expect(config.has("backtrace")).toBe(true);
    });

    it("should merge nested values without dropping siblings", () => {
      config.set({ render: { displayContext: false } });
      config.set({ debug: true });
      expect(config.getAll()).toEqual({
        debug: true,
        backtrace: false,
        context: true,
        render: { displayContext: false },
      });
    });

    it("should be cleared by reset()", () => {
      config.set({ context: false });
      config.reset();
      expect(config.get("context")).toBe(true);
    });
  });

  describe("environment", () => {
    it("should parse UNIONERR_ variables into nested paths", () => {
      const parsed = loadConfigFromEnv({
        UNIONERR_BACKTRACE: "1",
        UNIONERR_RENDER_DISPLAYCONTEXT: "false",
        UNIONERR_LIMIT: "12",
        UNIONERR_LABEL: "svc",
        HOME: "/home/test",
      });
      expect(parsed).toEqual({
        backtrace: true,
        render: { displayContext: false },
        limit: 12,
        label: "svc",
      });
    });

    it("should treat an empty value as false", () => {
      expect(loadConfigFromEnv({ UNIONERR_DEBUG: "" })).toEqual({ debug: false });
    });

    it("should read process.env on first access", () => {
      process.env.UNIONERR_BACKTRACE = "true";
      process.env.UNIONERR_CONTEXT = "0";
      expect(config.get("backtrace")).toBe(true);
      expect(config.get("context")).toBe(false);
    });

    it("should let set() win over the environment", () => {
      process.env.UNIONERR_BACKTRACE = "1";
      config.set({ backtrace: false });
      expect(config.get("backtrace")).toBe(false);
    });
  });

  describe("defineConfig()", () => {
    it("should return its argument", () => {
      const cfg = { backtrace: true, render: { displayContext: false } };
      expect(defineConfig(cfg)).toBe(cfg);
    });
  });
});

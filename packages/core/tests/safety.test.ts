/**
 * Tests for invariants, violations and debug logging
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  config,
  debugLog,
  debugOnly,
  formatLogLine,
  invariant,
  setLogWriter,
  UnionInvariantError,
  unreachable,
  violation,
} from "@unionerr/core";

describe("safety", () => {
  let lines: string[];

  beforeEach(() => {
    config.reset();
    lines = [];
    setLogWriter((line) => lines.push(line));
  });

  afterEach(() => {
    setLogWriter();
    config.reset();
  });

  describe("invariant()", () => {
    it("should pass silently when the condition holds", () => {
      expect(() => invariant(true, "arity", "unused")).not.toThrow();
    });

    it("should throw a UnionInvariantError carrying the reason", () => {
      let caught: unknown;
      try {
        invariant(false, "moved", "already consumed");
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(UnionInvariantError);
      expect(caught).toMatchObject({
        name: "UnionInvariantError",
        reason: "moved",
        message: "already consumed",
      });
    });

    it("should build lazy messages only on failure", () => {
      let built = 0;
      const message = () => {
        built++;
        return "lazy";
      };
      invariant(true, "arity", message);
      expect(built).toBe(0);
      expect(() => invariant(false, "arity", message)).toThrow("lazy");
      expect(built).toBe(1);
    });
  });

  describe("violation()", () => {
    it("should return the error without throwing", () => {
      const err = violation("unmatched", "nothing matched");
      expect(err.reason).toBe("unmatched");
      expect(err.message).toBe("nothing matched");
    });

    it("should log the violation when debug is on", () => {
      config.set({ debug: true });
      violation("take-mismatch", "wrong payload");
      expect(lines).toEqual(["[unionerr:invariant] take-mismatch: wrong payload"]);
    });

    it("should stay quiet when debug is off", () => {
      violation("take-mismatch", "wrong payload");
      expect(lines).toEqual([]);
    });
  });

  describe("unreachable()", () => {
    it("should always throw", () => {
      expect(() => unreachable()).toThrow("Unreachable code reached");
    });
  });

  describe("debugOnly()", () => {
    it("should run only with debug enabled", () => {
      let runs = 0;
      debugOnly(() => runs++);
      expect(runs).toBe(0);
      config.set({ debug: true });
      debugOnly(() => runs++);
      expect(runs).toBe(1);
    });
  });

  describe("debugLog()", () => {
    it("should format lines with the scope", () => {
      expect(formatLogLine("union", "carried")).toBe("[unionerr:union] carried");
    });

    it("should evaluate lazy messages only when writing", () => {
      let built = 0;
      debugLog("union", () => `built ${++built}`);
      expect(built).toBe(0);
      config.set({ debug: true });
      debugLog("union", () => `built ${++built}`);
      expect(lines).toEqual(["[unionerr:union] built 1"]);
    });
  });
});

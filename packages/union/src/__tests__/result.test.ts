import { describe, it, expect } from "vitest";
import {
  Err,
  Ok,
  isErr,
  isOk,
  map,
  mapErr,
  unwrap,
  unwrapErr,
  unwrapOr,
  type Result,
} from "../index.js";

function parsePort(text: string): Result<number, string> {
  const port = Number(text);
  return Number.isInteger(port) ? Ok(port) : Err(`not a port: ${text}`);
}

describe("Result", () => {
  it("guards tell the arms apart", () => {
    expect(isOk(parsePort("80"))).toBe(true);
    expect(isErr(parsePort("eighty"))).toBe(true);
  });

  describe("map()", () => {
    it("transforms the success value", () => {
      expect(map(parsePort("80"), (p) => p + 1)).toEqual({ _tag: "Ok", value: 81 });
    });

    it("leaves the error arm alone", () => {
      const failed = parsePort("x");
      expect(map(failed, (p) => p + 1)).toBe(failed);
    });
  });

  describe("mapErr()", () => {
    it("transforms the error value", () => {
      expect(mapErr(parsePort("x"), (e) => e.length)).toEqual({ _tag: "Err", error: 13 });
    });

    it("leaves the success arm alone", () => {
      const ok = parsePort("80");
      expect(mapErr(ok, (e) => e.length)).toBe(ok);
    });
  });

  describe("unwrap()", () => {
    it("returns the success value", () => {
      expect(unwrap(parsePort("443"))).toBe(443);
    });

    it("throws the error arm itself", () => {
      const cause = new Error("refused");
      expect(() => unwrap(Err(cause))).toThrow(cause);
    });
  });

  describe("unwrapOr()", () => {
    it("falls back only on failure", () => {
      expect(unwrapOr(parsePort("22"), 8080)).toBe(22);
      expect(unwrapOr(parsePort("ssh"), 8080)).toBe(8080);
    });
  });

  describe("unwrapErr()", () => {
    it("returns the error value", () => {
      expect(unwrapErr(parsePort("x"))).toBe("not a port: x");
    });

    it("throws on success", () => {
      expect(() => unwrapErr(parsePort("80"))).toThrow("unwrapErr called on an Ok result");
    });
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import {
  AnyError,
  OneOf,
  config,
  isOk,
  typeSet,
  variant,
  UnionInvariantError,
  type Result,
} from "../index.js";
import { Errors, Io, IoError, type Assert, type Equals } from "./fixtures.js";

const Mixed = typeSet(Io, variant.anyError);

describe("anyError", () => {
  beforeEach(() => {
    config.reset();
  });

  describe("AnyError", () => {
    it("takes the wrapped error's message", () => {
      const e = new AnyError(new RangeError("too far"));
      expect(e.message).toBe("too far");
      expect(e.name).toBe("AnyError");
      expect(e.inner).toBeInstanceOf(RangeError);
    });

    it("from() does not wrap twice", () => {
      const once = AnyError.from(new Error("x"));
      expect(AnyError.from(once)).toBe(once);
    });
  });

  describe("variant.anyError", () => {
    it("renders as the wrapped error", () => {
      const e = new AnyError(new TypeError("bad header"));
      expect(variant.anyError.tag).toBe("anyError");
      expect(variant.anyError.is(e)).toBe(true);
      expect(variant.anyError.is(new TypeError("bad header"))).toBe(false);
      expect(variant.anyError.display(e)).toBe("bad header");
      expect(variant.anyError.debug(e)).toBe("TypeError: bad header");
    });
  });

  describe("OneOf.anyError()", () => {
    it("puts a foreign error into the anyError slot", () => {
      const u = OneOf.anyError(Mixed, new TypeError("bad header"));
      expect(u.tag).toBe("anyError");
      expect(u.display()).toBe("bad header");
      expect(u.debug()).toBe("TypeError: bad header");
    });

    it("wraps even an error that has its own slot", () => {
      const io = new IoError("disk gone");
      const r = OneOf.anyError(Mixed, io).narrow(variant.anyError);
      type _r = Assert<Equals<typeof r, Result<AnyError, OneOf<[typeof Io]>>>>;
      expect(isOk(r)).toBe(true);
      if (isOk(r)) {
        expect(r.value.inner).toBe(io);
      }
    });

    it("exposes the wrapped error's cause as the source", () => {
      const cause = new Error("socket closed");
      const u = OneOf.anyError(Mixed, new Error("read failed", { cause }));
      expect(u.source()).toBe(cause);
      expect(u.chain()).toEqual([cause]);
    });

    it("keeps context like any other union", () => {
      const u = OneOf.anyError(Mixed, new Error("boom")).context("while syncing");
      expect(u.display()).toBe("boom\n\nContext:\n\t- while syncing");
    });

    it("needs a set with the anyError slot", () => {
      let caught: unknown;
      try {
        // @ts-expect-error {io, number, boolean} has no anyError candidate
        OneOf.anyError(Errors, new TypeError("x"));
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(UnionInvariantError);
      expect(caught).toMatchObject({
        reason: "not-a-member",
        message: "{io, number, boolean} has no anyError slot",
      });
    });
  });
});

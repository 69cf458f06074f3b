import { describe, it, expect, beforeEach } from "vitest";
import { config, oneOf, renderReport, report } from "../index.js";
import { Errors, IoError } from "./fixtures.js";

function manifestFailure() {
  const cause = new Error("permission denied");
  return oneOf(Errors, new IoError("disk gone", { cause })).context("While reading the manifest");
}

describe("report", () => {
  beforeEach(() => {
    config.reset();
  });

  it("renders header, debug form and causes", () => {
    expect(renderReport(manifestFailure())).toBe(
      [
        "error[io] in {io, number, boolean}",
        "IoError: disk gone",
        "",
        "Context:",
        "\t- While reading the manifest",
        "caused by: permission denied",
      ].join("\n"),
    );
  });

  it("can leave out the causes", () => {
    expect(renderReport(oneOf(Errors, 12), { causes: false })).toBe(
      "error[number] in {io, number, boolean}\n12",
    );
  });

  it("writes through the given writer without consuming the union", () => {
    const lines: string[] = [];
    const u = oneOf(Errors, false);
    report(u, { writer: (line) => lines.push(line) });
    expect(lines).toEqual(["error[boolean] in {io, number, boolean}\nfalse"]);
    expect(u.isMoved).toBe(false);
  });
});

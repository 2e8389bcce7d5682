/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ok,
  error,
  map,
  flatMap,
  mapError,
  collect,
} from "./result.js";
import type { Result } from "./result.js";

describe("Result", () => {
  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("flatMap", () => {
    const half = (x: number): Result<number, string> =>
      x % 2 === 0 ? ok(x / 2) : error(`${x} is odd`);

    it("should chain ok values", () => {
      expect(flatMap(ok<number, string>(8), half)).to.deep.equal({
        ok: true,
        value: 4,
      });
    });

    it("should stop at the first error", () => {
      expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
        ok: false,
        error: "3 is odd",
      });
    });
  });

  describe("mapError", () => {
    it("should transform the error only", () => {
      expect(
        mapError(error<number, string>("bad"), (e) => e.length)
      ).to.deep.equal({ ok: false, error: 3 });
      expect(mapError(ok<number, string>(1), (e) => e.length)).to.deep.equal({
        ok: true,
        value: 1,
      });
    });
  });

  describe("collect", () => {
    it("should gather values in order", () => {
      const results: Result<number, readonly string[]>[] = [ok(1), ok(2)];
      expect(collect(results)).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should keep every error", () => {
      const results: Result<number, readonly string[]>[] = [
        error(["a"]),
        ok(2),
        error(["b", "c"]),
      ];
      expect(collect(results)).to.deep.equal({
        ok: false,
        error: ["a", "b", "c"],
      });
    });
  });
});

/**
 * Tests for type string parsing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { typeRefKey } from "@genscan/engine";
import {
  formatTypeRef,
  parseTypeString,
  splitTypeArguments,
} from "./parser.js";

const keyOf = (text: string, scope: readonly string[] = []): string => {
  const result = parseTypeString(text, scope);
  if (!result.ok) throw new Error(result.error);
  return typeRefKey(result.value);
};

describe("Type strings", () => {
  describe("splitTypeArguments", () => {
    it("should split at top-level commas only", () => {
      expect(
        splitTypeArguments("A,App.Map`2[[B,C]],D")
      ).to.deep.equal({ ok: true, value: ["A", "App.Map`2[[B,C]]", "D"] });
    });

    it("should reject unbalanced payloads", () => {
      expect(splitTypeArguments("A]").ok).to.equal(false);
      expect(splitTypeArguments("App.Box`1[[A").ok).to.equal(false);
    });
  });

  describe("parseTypeString", () => {
    it("should parse plain and open generic names", () => {
      expect(keyOf("App.Service")).to.equal("App.Service");
      expect(keyOf("App.IHandler`1")).to.equal("App.IHandler`1");
    });

    it("should parse nested instantiations", () => {
      expect(keyOf("App.Map`2[[TKey,App.Box`1[[int]]]]", ["TKey"])).to.equal(
        "App.Map`2[!TKey,App.Box`1[System.Int32]]"
      );
    });

    it("should parse arrays of any element", () => {
      expect(keyOf("string[]")).to.equal("System.String[]");
      expect(keyOf("App.Box`1[[T[]]][]", ["T"])).to.equal("App.Box`1[!T[]][]");
    });

    it("should resolve keyword aliases", () => {
      expect(keyOf("long")).to.equal("System.Int64");
      expect(keyOf("object")).to.equal("System.Object");
    });

    it("should only treat names in scope as type parameters", () => {
      expect(keyOf("TCommand", ["TCommand"])).to.equal("!TCommand");
      expect(keyOf("TCommand")).to.equal("TCommand");
    });

    it("should reject an argument count that differs from the arity", () => {
      expect(parseTypeString("App.Map`2[[System.String]]")).to.deep.equal({
        ok: false,
        error: "'App.Map`2' takes 2 type argument(s), got 1",
      });
    });

    it("should reject malformed strings", () => {
      expect(parseTypeString("  ")).to.deep.equal({
        ok: false,
        error: "Empty type string",
      });
      expect(parseTypeString("App.Box`1[[A]").ok).to.equal(false);
      expect(parseTypeString("App Service")).to.deep.equal({
        ok: false,
        error: "Invalid type name 'App Service'",
      });
    });
  });

  describe("formatTypeRef", () => {
    it("should write refs back in metadata syntax", () => {
      const parsed = parseTypeString("App.Map`2[[int,App.Box`1[[T]]]][]", [
        "T",
      ]);
      expect(parsed.ok).to.equal(true);
      if (!parsed.ok) return;
      expect(formatTypeRef(parsed.value)).to.equal(
        "App.Map`2[[System.Int32,App.Box`1[[T]]]][]"
      );
    });
  });
});

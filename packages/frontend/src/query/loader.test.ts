/**
 * Tests for query file loading
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadQueryFile, parseQueryText } from "./loader.js";

describe("Query loader", () => {
  describe("parseQueryText", () => {
    it("should read one query per document", () => {
      const result = parseQueryText(
        [
          "declaringType: App.Registry",
          "customHandler: Register",
          "---",
          "name: second",
          "declaringType: App.Other",
        ].join("\n")
      );

      expect(result.ok ? result.value : []).to.deep.equal([
        { declaringType: "App.Registry", customHandler: "Register" },
        { name: "second", declaringType: "App.Other" },
      ]);
    });

    it("should flatten sequences of queries", () => {
      const result = parseQueryText(
        [
          "- declaringType: App.A",
          "- declaringType: App.B",
          "  assignableToGenericArguments: [string, int]",
        ].join("\n")
      );

      expect(result.ok ? result.value : []).to.deep.equal([
        { declaringType: "App.A" },
        {
          declaringType: "App.B",
          assignableToGenericArguments: ["string", "int"],
        },
      ]);
    });

    it("should skip empty documents", () => {
      const result = parseQueryText("---\n---\ndeclaringType: App.A\n");
      expect(result.ok ? result.value : []).to.deep.equal([
        { declaringType: "App.A" },
      ]);
    });

    it("should report YAML errors", () => {
      const result = parseQueryText("declaringType: [App.A\n", "queries.yaml");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("GSN3013");
      expect(result.error[0]?.message).to.match(/^Invalid YAML in queries\.yaml: /);
    });
  });

  describe("loadQueryFile", () => {
    let tempDir: string;

    before(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "genscan-query-"));
    });

    after(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const missing = path.join(tempDir, "missing.yaml");
      const result = loadQueryFile(missing);
      expect(result.ok ? [] : result.error.map((d) => d.message)).to.deep.equal(
        [`Query file not found: ${missing}`]
      );
    });

    it("should load queries from disk", () => {
      const file = path.join(tempDir, "queries.yaml");
      fs.writeFileSync(file, "declaringType: App.Registry\n");
      const result = loadQueryFile(file);
      expect(result.ok ? result.value : []).to.deep.equal([
        { declaringType: "App.Registry" },
      ]);
    });
  });
});

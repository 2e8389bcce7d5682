/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse scan command", () => {
        const result = parseArgs(["scan"]);
        expect(result.command).to.equal("scan");
      });

      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after a command", () => {
        const result = parseArgs(["scan", "-h"]);
        expect(result.command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should return an empty command for no arguments", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });
    });

    describe("Query file", () => {
      it("should parse the query file after the command", () => {
        const result = parseArgs(["scan", "queries/handlers.yaml"]);
        expect(result.command).to.equal("scan");
        expect(result.target).to.equal("queries/handlers.yaml");
      });

      it("should handle no query file", () => {
        const result = parseArgs(["scan"]);
        expect(result.target).to.be.undefined;
      });

      it("should not take option values as the query file", () => {
        const result = parseArgs(["scan", "-c", "other.json", "q.yaml"]);
        expect(result.options.config).to.equal("other.json");
        expect(result.target).to.equal("q.yaml");
      });
    });

    describe("Options", () => {
      it("should parse -V short option for verbose", () => {
        const result = parseArgs(["scan", "-V"]);
        expect(result.options.verbose).to.be.true;
      });

      it("should parse --quiet option", () => {
        const result = parseArgs(["scan", "--quiet"]);
        expect(result.options.quiet).to.be.true;
      });

      it("should parse -q as the query name", () => {
        const result = parseArgs(["scan", "-q", "commands"]);
        expect(result.options.query).to.equal("commands");
        expect(result.options.quiet).to.be.undefined;
      });

      it("should parse --format and --out", () => {
        const result = parseArgs(["scan", "--format", "json", "--out", "m.json"]);
        expect(result.options).to.deep.equal({ format: "json", out: "m.json" });
      });

      it("should parse short forms of format and out", () => {
        const result = parseArgs(["extract", "-f", "text", "-o", "g.json"]);
        expect(result.options.format).to.equal("text");
        expect(result.options.out).to.equal("g.json");
      });

      it("should take an empty value for a trailing option", () => {
        const result = parseArgs(["scan", "--config"]);
        expect(result.options.config).to.equal("");
      });

      it("should ignore unknown options", () => {
        const result = parseArgs(["scan", "--unknown", "--quiet"]);
        expect(result.options).to.deep.equal({ quiet: true });
      });
    });
  });
});

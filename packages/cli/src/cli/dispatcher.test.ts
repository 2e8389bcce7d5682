/**
 * Tests for the CLI dispatcher
 */

import { describe, it, before, after, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCli } from "./dispatcher.js";

const graphDocument = {
  modules: [
    {
      name: "App",
      types: [
        {
          name: "App.ICommandHandler`1",
          kind: "interface",
          typeParameters: ["TCommand"],
        },
        {
          name: "App.PingHandler",
          interfaces: ["App.ICommandHandler`1[[System.String]]"],
        },
        {
          name: "App.Registry",
          isStatic: true,
          methods: [
            {
              name: "Register",
              isStatic: true,
              typeParameters: [
                {
                  name: "THandler",
                  constraintTypes: ["App.ICommandHandler`1[[TCommand]]"],
                },
                { name: "TCommand" },
              ],
            },
          ],
        },
      ],
    },
  ],
};

const queries = [
  "name: commands",
  "declaringType: App.Registry",
  "customHandler: Register",
  "assignableTo: App.ICommandHandler`1",
].join("\n");

describe("CLI Dispatcher", () => {
  let tempDir: string;
  let logged: string[];
  let errors: string[];
  const originalLog = console.log;
  const originalError = console.error;

  const write = (name: string, content: string): string => {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  before(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "genscan-cli-"));
    write("app.graph.json", JSON.stringify(graphDocument));
    write("queries.yaml", queries);
    write(
      "genscan.json",
      JSON.stringify({ graph: "app.graph.json", queries: ["queries.yaml"] })
    );
  });

  after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logged = [];
    errors = [];
    console.log = (...args: unknown[]) => {
      logged.push(args.join(" "));
    };
    console.error = (...args: unknown[]) => {
      errors.push(args.join(" "));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  it("should print the version", async () => {
    expect(await runCli(["--version"], tempDir)).to.equal(0);
    expect(logged[0]).to.match(/^genscan v/);
  });

  it("should reject unknown commands", async () => {
    expect(await runCli(["emit"], tempDir)).to.equal(2);
    expect(errors[0]).to.equal("Error: Unknown command 'emit'");
  });

  it("should list matches as text", async () => {
    expect(await runCli(["scan"], tempDir)).to.equal(0);
    expect(logged).to.deep.equal([
      "commands: App.PingHandler <THandler=App.PingHandler, TCommand=System.String>",
    ]);
  });

  it("should write JSON to the output file", async () => {
    const out = path.join(tempDir, "matches.json");
    const exitCode = await runCli(
      ["scan", "--format", "json", "-o", out, "--quiet"],
      tempDir
    );

    expect(exitCode).to.equal(0);
    expect(logged).to.deep.equal([]);
    expect(JSON.parse(fs.readFileSync(out, "utf-8"))).to.deep.equal([
      {
        query: "commands",
        type: "App.PingHandler",
        module: "App",
        generalizations: ["App.ICommandHandler<System.String>"],
        binding: { THandler: "App.PingHandler", TCommand: "System.String" },
      },
    ]);
  });

  it("should validate with check", async () => {
    expect(await runCli(["check"], tempDir)).to.equal(0);
    expect(logged[1]).to.equal("  commands");
  });

  it("should fail with 4 for an unknown query name", async () => {
    expect(await runCli(["scan", "-q", "events"], tempDir)).to.equal(4);
    expect(errors).to.deep.equal([
      "error GSN3015: No query named 'events' Hint: Known queries: commands",
    ]);
  });

  it("should fail with 4 when a query cannot be built", async () => {
    const broken = write("broken.yaml", "declaringType: App.Nope\n");
    expect(await runCli(["scan", broken], tempDir)).to.equal(4);
    expect(errors).to.deep.equal([
      "error GSN3001: Type not found for 'declaringType': App.Nope (query 'App.Nope')",
    ]);
  });

  it("should fail with 1 when the graph is missing", async () => {
    write(
      "missing-graph.json",
      JSON.stringify({ graph: "nowhere.json", queries: [] })
    );
    const exitCode = await runCli(
      ["check", "--config", "missing-graph.json"],
      tempDir
    );
    expect(exitCode).to.equal(1);
    expect(errors).to.deep.equal([
      `error GSN9001: Graph file not found: ${path.join(tempDir, "nowhere.json")}`,
    ]);
  });

  it("should refuse to extract from a graph document", async () => {
    expect(await runCli(["extract"], tempDir)).to.equal(1);
    expect(errors[0]).to.match(/^error GSN2005: /);
  });

  it("should fail with 3 without a config", async () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), "genscan-empty-"));
    try {
      expect(await runCli(["scan"], empty)).to.equal(3);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });
});

/**
 * Tests for scan output formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { formatMatches } from "./scan.js";
import type { ScanMatch } from "./scan.js";

const matches: readonly ScanMatch[] = [
  {
    query: "startup",
    type: "App.Startup",
    module: "App",
    generalizations: [],
    binding: null,
  },
  {
    query: "commands",
    type: "App.PingHandler",
    module: "App",
    generalizations: ["App.ICommandHandler<System.String>"],
    binding: { THandler: "App.PingHandler", TCommand: "System.String" },
  },
];

describe("Scan output", () => {
  it("should write one line per match", () => {
    expect(formatMatches(matches, "text")).to.equal(
      [
        "startup: App.Startup",
        "commands: App.PingHandler <THandler=App.PingHandler, TCommand=System.String>",
      ].join("\n")
    );
  });

  it("should write nothing for no matches", () => {
    expect(formatMatches([], "text")).to.equal("");
    expect(formatMatches([], "json")).to.equal("[]");
  });

  it("should write JSON that parses back to the matches", () => {
    expect(JSON.parse(formatMatches(matches, "json"))).to.deep.equal(matches);
  });
});

/**
 * Tests for module selection and declaration enumeration
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { declare, graphOf } from "../test-harness.js";
import { namedType } from "../graph/type-ref.js";
import type { Query } from "../query/types.js";
import { selectModules, typesOf } from "./scanner.js";

describe("Type graph scanner", () => {
  const graph = graphOf(
    [
      declare("App.B", { nestedTypes: ["App.B+Inner"] }),
      declare("Other.A"),
      declare("App.C"),
      declare("App.B+Inner", {
        containingType: "App.B",
        nestedTypes: ["App.B+Inner+Deepest"],
      }),
      declare("App.B+Inner+Deepest", { containingType: "App.B+Inner" }),
      declare("Global"),
      declare("Lib.Helper", { module: "Lib.Core" }),
      declare("Vendor.Thing", { module: "Vendor" }),
    ],
    [
      { name: "App", references: ["Lib.Core", "Vendor"] },
      { name: "Lib.Core" },
      { name: "Vendor" },
    ]
  );

  const moduleNames = (query: Query) =>
    selectModules(graph, query).map((module) => module.name);

  describe("selectModules", () => {
    it("should default to the declaring module", () => {
      expect(moduleNames({ position: { module: "App" } })).to.deep.equal([
        "App",
      ]);
    });

    it("should filter the reference closure by name", () => {
      expect(
        moduleNames({ position: { module: "App" }, assemblyNameFilter: "*e*" })
      ).to.deep.equal(["Lib.Core", "Vendor", "System.Runtime"]);
    });

    it("should prefer the module of a named type", () => {
      expect(
        moduleNames({
          position: { module: "App" },
          assemblyOfType: namedType("Vendor.Thing"),
          assemblyNameFilter: "*",
        })
      ).to.deep.equal(["Vendor"]);
    });

    it("should select nothing for an unknown type", () => {
      expect(
        moduleNames({
          position: { module: "App" },
          assemblyOfType: namedType("Nowhere.Missing"),
        })
      ).to.deep.equal([]);
    });
  });

  describe("typesOf", () => {
    it("should enumerate depth-first in declaration order", () => {
      const app = graph.getModule("App");
      expect(app).to.not.equal(undefined);
      if (!app) return;

      const names = [...typesOf(graph, app)].map((type) => type.name);
      expect(names).to.deep.equal([
        "App.B",
        "App.B+Inner",
        "App.B+Inner+Deepest",
        "App.C",
        "Other.A",
        "Global",
      ]);
    });

    it("should be lazy", () => {
      const app = graph.getModule("App");
      if (!app) throw new Error("missing module");

      const iterator = typesOf(graph, app);
      expect(iterator.next().value?.name).to.equal("App.B");
      expect(iterator.next().value?.name).to.equal("App.B+Inner");
    });
  });
});

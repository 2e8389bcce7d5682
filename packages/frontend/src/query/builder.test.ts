/**
 * Tests for query construction
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { bindingKey, evaluate, typeRefKey } from "@genscan/engine";
import type { TypeGraph } from "@genscan/engine";
import { parseGraphDocument } from "../graph-loader/loader.js";
import type { GraphDocument } from "../graph-loader/document.js";
import { buildQueries, buildQuery } from "./builder.js";
import type { BuiltQuery } from "./builder.js";

const document: GraphDocument = {
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
                  hasReferenceTypeConstraint: true,
                  constraintTypes: ["App.ICommandHandler`1[[TCommand]]"],
                },
                { name: "TCommand" },
              ],
            },
          ],
        },
        {
          name: "App.RegistryBase",
          isAbstract: true,
          methods: [{ name: "Scan", typeParameters: [] }],
        },
        { name: "App.Derived", baseType: "App.RegistryBase" },
        { name: "App.MarkerAttribute", baseType: "System.Attribute" },
        { name: "App.Box`2", typeParameters: ["A", "B"] },
      ],
    },
  ],
};

const loadGraph = (): TypeGraph => {
  const result = parseGraphDocument(document);
  if (!result.ok) throw new Error(result.error[0]?.message);
  return result.value.graph;
};

const graph = loadGraph();

const built = (raw: unknown): BuiltQuery => {
  const result = buildQuery(graph, raw);
  if (!result.ok) {
    throw new Error(result.error.map((d) => d.message).join("\n"));
  }
  return result.value;
};

const failure = (raw: unknown): readonly string[] => {
  const result = buildQuery(graph, raw);
  return result.ok
    ? []
    : result.error.map((diagnostic) => `${diagnostic.code} ${diagnostic.message}`);
};

describe("Query builder", () => {
  describe("buildQuery", () => {
    it("should resolve the declaring type, handler and target", () => {
      const { name, query, warnings } = built({
        declaringType: "App.Registry",
        customHandler: "Register",
        assignableTo: "App.ICommandHandler`1",
      });

      expect(name).to.equal("App.Registry.Register");
      expect(query.position).to.deep.equal({
        module: "App",
        containingType: "App.Registry",
      });
      expect(query.assignableTo && typeRefKey(query.assignableTo)).to.equal(
        "App.ICommandHandler`1"
      );
      expect(query.handler?.kind).to.equal("method");
      if (query.handler?.kind !== "method") return;
      expect(
        query.handler.typeParameters.map((param) => param.name)
      ).to.deep.equal(["THandler", "TCommand"]);
      expect(warnings).to.deep.equal([]);
    });

    it("should produce a query the engine evaluates", () => {
      const { query } = built({
        name: "commands",
        declaringType: "App.Registry",
        customHandler: "Register",
        assignableTo: "App.ICommandHandler`1",
      });

      const keys = [...evaluate(query, graph)].map((record) =>
        record.binding ? bindingKey(record.binding) : ""
      );
      expect(keys).to.deep.equal([
        "THandler=App.PingHandler;TCommand=System.String",
      ]);
    });

    it("should find handlers declared on a base class", () => {
      const { query } = built({
        declaringType: "App.Derived",
        customHandler: "Scan",
      });
      expect(query.handler).to.deep.equal({
        kind: "method",
        name: "Scan",
        typeParameters: [],
      });
    });

    it("should treat unknown handlers as type-level methods", () => {
      const { query } = built({
        declaringType: "App.Registry",
        customHandler: "Configure",
      });
      expect(query.handler).to.deep.equal({
        kind: "typeMethod",
        name: "Configure",
      });
    });

    it("should reject a missing method when the kind is explicit", () => {
      expect(
        failure({
          declaringType: "App.Registry",
          customHandler: "Configure",
          customHandlerKind: "method",
        })
      ).to.deep.equal([
        "GSN3005 Handler method 'Configure' not found on App.Registry or its base types (query 'App.Registry.Configure')",
      ]);
    });

    it("should take inline type parameters over the graph", () => {
      const { query } = built({
        declaringType: "App.Registry",
        customHandler: "Handle",
        typeParameters: [
          {
            name: "T",
            hasConstructorConstraint: true,
            constraintTypes: ["App.ICommandHandler`1[[string]]"],
          },
        ],
      });

      expect(query.handler?.kind).to.equal("method");
      if (query.handler?.kind !== "method") return;
      const [parameter] = query.handler.typeParameters;
      expect(parameter?.hasConstructorConstraint).to.equal(true);
      expect(parameter?.constraintTypes.map(typeRefKey)).to.deep.equal([
        "App.ICommandHandler`1[System.String]",
      ]);
    });

    it("should require a handler for inline type parameters", () => {
      expect(
        failure({
          declaringType: "App.Registry",
          typeParameters: [{ name: "T" }],
        })
      ).to.deep.equal([
        "GSN3005 'typeParameters' and 'customHandlerKind' need a 'customHandler' (query 'App.Registry')",
      ]);
    });

    it("should close targets with explicit generic arguments", () => {
      const { query } = built({
        declaringType: "App.Registry",
        assignableTo: "App.Box`2",
        assignableToGenericArguments: ["System.String", "int"],
        excludeAssignableTo: "App.ICommandHandler`1[[long]]",
      });

      expect(query.assignableTo && typeRefKey(query.assignableTo)).to.equal(
        "App.Box`2[System.String,System.Int32]"
      );
      expect(
        query.excludeAssignableTo && typeRefKey(query.excludeAssignableTo)
      ).to.equal("App.ICommandHandler`1[System.Int64]");
    });

    it("should check the generic argument count", () => {
      expect(
        failure({
          declaringType: "App.Registry",
          assignableTo: "App.Box`2",
          assignableToGenericArguments: ["System.String"],
        })
      ).to.deep.equal([
        "GSN3006 'App.Box`2' takes 2 type argument(s), got 1 (query 'App.Registry')",
      ]);
    });

    it("should not accept arguments for an instantiated target", () => {
      const codes = failure({
        declaringType: "App.Registry",
        assignableTo: "App.ICommandHandler`1[[System.String]]",
        assignableToGenericArguments: ["System.String"],
      }).map((line) => line.split(" ")[0]);
      expect(codes).to.deep.equal(["GSN3006"]);
    });

    it("should suggest the generic name for a missing type", () => {
      const result = buildQuery(graph, {
        declaringType: "App.Registry",
        assignableTo: "App.ICommandHandler",
      });

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("GSN3003");
      expect(result.error[0]?.message).to.equal(
        "Type not found for 'assignableTo': App.ICommandHandler (query 'App.Registry')"
      );
      expect(result.error[0]?.hint).to.equal(
        "Did you mean 'App.ICommandHandler`1'?"
      );
    });

    it("should resolve attribute filters", () => {
      const { query } = built({
        declaringType: "App.Registry",
        attributeFilter: "App.MarkerAttribute",
        excludeByAttribute: "System.ObsoleteAttribute",
      });
      expect(query.attributeFilter && typeRefKey(query.attributeFilter)).to.equal(
        "App.MarkerAttribute"
      );
      expect(
        failure({ declaringType: "App.Registry", attributeFilter: "App.Nope" })
      ).to.deep.equal([
        "GSN3004 Type not found for 'attributeFilter': App.Nope (query 'App.Registry')",
      ]);
    });

    it("should warn when the marker type overrides the name filter", () => {
      const { query, warnings } = built({
        declaringType: "App.Registry",
        assemblyOfType: "System.String",
        assemblyNameFilter: "App*",
      });
      expect(query.assemblyOfType && typeRefKey(query.assemblyOfType)).to.equal(
        "System.String"
      );
      expect(warnings.map((d) => `${d.code} ${d.severity}`)).to.deep.equal([
        "GSN3010 warning",
      ]);
    });

    it("should reject malformed documents", () => {
      expect(failure("App.Registry")).to.deep.equal([
        "GSN3007 Query document must be an object (query 'query')",
      ]);
      expect(failure({ name: "empty" })).to.deep.equal([
        "GSN3001 Missing 'declaringType' (query 'empty')",
      ]);
      expect(
        failure({ declaringType: "App.Registry", typeNameFilter: 3 })
      ).to.deep.equal([
        "GSN3008 'typeNameFilter' must be a string (query 'App.Registry')",
      ]);
    });
  });

  describe("buildQueries", () => {
    it("should reject duplicate names", () => {
      const result = buildQueries(graph, [
        { declaringType: "App.Registry" },
        { declaringType: "App.Registry", typeNameFilter: "App.*" },
      ]);
      expect(result.ok ? [] : result.error.map((d) => d.message)).to.deep.equal([
        "Duplicate query name 'App.Registry'",
      ]);
    });

    it("should collect errors from every query", () => {
      const result = buildQueries(graph, [
        { declaringType: "App.Missing" },
        { name: "ok", declaringType: "App.Registry" },
        42,
      ]);
      expect(result.ok ? [] : result.error.map((d) => d.code)).to.deep.equal([
        "GSN3001",
        "GSN3007",
      ]);
    });

    it("should keep the input order", () => {
      const result = buildQueries(graph, [
        { name: "second", declaringType: "App.Derived" },
        { name: "first", declaringType: "App.Registry" },
      ]);
      expect(result.ok ? result.value.map((q) => q.name) : []).to.deep.equal([
        "second",
        "first",
      ]);
    });
  });
});

/**
 * Tests for TypeRef identity, substitution and display
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { declare } from "../test-harness.js";
import {
  arityOf,
  arrayOf,
  containsTypeParameter,
  displayDeclaration,
  displayTypeRef,
  isOpenDefinition,
  namedType,
  substituteTypeRef,
  substitutionFor,
  typeParameter,
  typeRefKey,
  typeRefsEqual,
} from "./type-ref.js";

describe("TypeRef", () => {
  const string = namedType("System.String");

  describe("typeRefKey", () => {
    it("should spell out arguments, parameters and arrays", () => {
      const ref = namedType("App.Map`2", [
        string,
        arrayOf(typeParameter("T")),
      ]);
      expect(typeRefKey(ref)).to.equal("App.Map`2[System.String,!T[]]");
    });

    it("should compare structurally", () => {
      expect(
        typeRefsEqual(
          namedType("App.Box`1", [string]),
          namedType("App.Box`1", [namedType("System.String")])
        )
      ).to.equal(true);
      expect(
        typeRefsEqual(namedType("App.Box`1", [string]), namedType("App.Box`1"))
      ).to.equal(false);
    });
  });

  describe("generic helpers", () => {
    it("should read arity from the metadata name", () => {
      expect(arityOf("App.IHandler`2")).to.equal(2);
      expect(arityOf("App.Plain")).to.equal(0);
    });

    it("should recognise open definitions", () => {
      expect(isOpenDefinition(namedType("App.IHandler`1"))).to.equal(true);
      expect(isOpenDefinition(namedType("App.IHandler`1", [string]))).to.equal(
        false
      );
      expect(isOpenDefinition(namedType("App.Plain"))).to.equal(false);
    });

    it("should find nested parameters", () => {
      expect(
        containsTypeParameter(
          namedType("App.Box`1", [arrayOf(typeParameter("T"))])
        )
      ).to.equal(true);
      expect(containsTypeParameter(namedType("App.Box`1", [string]))).to.equal(
        false
      );
    });
  });

  describe("substitution", () => {
    it("should instantiate a declaration's parameters", () => {
      const declaration = declare("App.Pair`2", { typeParameters: ["K", "V"] });
      const substitution = substitutionFor(
        declaration,
        namedType("App.Pair`2", [string, namedType("System.Int32")])
      );

      const result = substituteTypeRef(
        namedType("App.IMap`2", [typeParameter("V"), arrayOf(typeParameter("K"))]),
        substitution
      );
      expect(typeRefKey(result)).to.equal(
        "App.IMap`2[System.Int32,System.String[]]"
      );
    });

    it("should leave parameters alone for open references", () => {
      const declaration = declare("App.Box`1", { typeParameters: ["T"] });
      const substitution = substitutionFor(declaration, namedType("App.Box`1"));
      expect(substitution.size).to.equal(0);
    });
  });

  describe("display", () => {
    it("should render closed and open generics", () => {
      expect(displayTypeRef(namedType("App.IHandler`1", [string]))).to.equal(
        "App.IHandler<System.String>"
      );
      expect(displayTypeRef(namedType("App.Map`2"))).to.equal("App.Map<,>");
      expect(displayTypeRef(arrayOf(string))).to.equal("System.String[]");
    });

    it("should render nested types with dots", () => {
      expect(displayTypeRef(namedType("App.Outer`1+Inner"))).to.equal(
        "App.Outer.Inner"
      );
    });

    it("should spell out a declaration's own parameters", () => {
      expect(
        displayDeclaration(
          declare("App.Repository`2", { typeParameters: ["TKey", "TValue"] })
        )
      ).to.equal("App.Repository<TKey, TValue>");
    });
  });
});

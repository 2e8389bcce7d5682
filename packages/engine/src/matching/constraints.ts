/**
 * Constraint Solver
 *
 * Binds a handler's generic parameters for one candidate. Only the first
 * parameter is seeded from the candidate; every other parameter is bound
 * while its constraints are aligned against generalizations of the types
 * already bound. Each aligning generalization is its own branch, so one
 * candidate can produce several bindings (a type implementing
 * `IHandler<string>` and `IHandler<object>`).
 *
 * Termination: a parameter is bound when it is entered and bound parameters
 * are never entered again, so every recursive step binds a new parameter.
 */

import type { GenericParameter, TypeGraph, TypeRef } from "../graph/types.js";
import {
  containsTypeParameter,
  definitionOf,
  sameDefinition,
  typeRefKey,
  typeRefsEqual,
} from "../graph/type-ref.js";
import { isAssignable } from "./assignability.js";

export type BindingEntry = {
  readonly parameter: GenericParameter;
  readonly type: TypeRef;
};

/**
 * Full assignment of types to a handler's parameters, in ordinal order.
 */
export type Binding = readonly BindingEntry[];

export type SolveOptions = {
  /**
   * Generalization the candidate was accepted for. Constraints of the first
   * parameter on the same generic definition only consider this one.
   */
  readonly focus?: TypeRef;
};

/**
 * Parameters bound so far. Doubles as the in-progress set.
 */
type SolveState = ReadonlyMap<string, TypeRef>;

type SolveContext = {
  readonly graph: TypeGraph;
  readonly parameters: ReadonlyMap<string, GenericParameter>;
};

const bind = (state: SolveState, name: string, type: TypeRef): SolveState =>
  new Map(state).set(name, type);

const satisfiesFlags = (
  graph: TypeGraph,
  type: TypeRef,
  parameter: GenericParameter
): boolean => {
  if (parameter.hasReferenceTypeConstraint && graph.isValueType(type)) {
    return false;
  }

  if (parameter.hasValueTypeConstraint && !graph.isValueType(type)) {
    return false;
  }

  if (parameter.hasUnmanagedTypeConstraint && !graph.isUnmanagedType(type)) {
    return false;
  }

  if (parameter.hasConstructorConstraint) {
    const hasPublicParameterlessConstructor = graph
      .constructorsOf(type)
      .some(
        (ctor) =>
          ctor.accessibility === "public" &&
          ctor.parameterCount === 0 &&
          !ctor.isStatic
      );
    if (!hasPublicParameterlessConstructor) return false;
  }

  return true;
};

const satisfies = (
  context: SolveContext,
  type: TypeRef,
  parameter: GenericParameter,
  state: SolveState,
  focus?: TypeRef
): readonly SolveState[] => {
  const bound = state.get(parameter.name);
  if (bound) {
    return typeRefsEqual(bound, type) ? [state] : [];
  }

  if (!satisfiesFlags(context.graph, type, parameter)) return [];

  let states: readonly SolveState[] = [bind(state, parameter.name, type)];
  for (const constraint of parameter.constraintTypes) {
    states = states.flatMap((current) =>
      satisfiesConstraintType(context, type, constraint, current, focus)
    );
    if (states.length === 0) return [];
  }

  return states;
};

const satisfiesConstraintType = (
  context: SolveContext,
  type: TypeRef,
  constraint: TypeRef,
  state: SolveState,
  focus: TypeRef | undefined
): readonly SolveState[] => {
  if (!containsTypeParameter(constraint)) {
    return isAssignable(context.graph, type, constraint).matched ? [state] : [];
  }

  switch (constraint.kind) {
    case "typeParameter": {
      // `where T : U` with U unbound is rechecked on the complete binding
      const other = state.get(constraint.name);
      if (!other) return [state];
      return isAssignable(context.graph, type, other).matched ? [state] : [];
    }

    case "array":
      return align(context, constraint, type, state);

    case "named": {
      const definition = definitionOf(constraint);
      const generalizations = isAssignable(
        context.graph,
        type,
        definition
      ).generalizations.filter(
        (generalization) =>
          !focus ||
          focus.kind !== "named" ||
          !sameDefinition(focus, definition) ||
          typeRefsEqual(generalization, focus)
      );

      return generalizations.flatMap((generalization) =>
        generalization.kind === "named"
          ? alignArguments(
              context,
              constraint.typeArguments,
              generalization.typeArguments,
              state
            )
          : []
      );
    }
  }
};

const alignArguments = (
  context: SolveContext,
  patterns: readonly TypeRef[],
  actuals: readonly TypeRef[],
  state: SolveState
): readonly SolveState[] => {
  if (patterns.length !== actuals.length) return [];

  let states: readonly SolveState[] = [state];
  patterns.forEach((pattern, index) => {
    const actual = actuals[index];
    states = actual
      ? states.flatMap((current) => align(context, pattern, actual, current))
      : [];
  });
  return states;
};

/**
 * Align a constraint argument (which may mention handler parameters)
 * against the corresponding closed argument of a generalization.
 */
const align = (
  context: SolveContext,
  pattern: TypeRef,
  actual: TypeRef,
  state: SolveState
): readonly SolveState[] => {
  // An argument that is itself an open parameter cannot be bound
  if (actual.kind === "typeParameter") return [];

  switch (pattern.kind) {
    case "typeParameter": {
      const parameter = context.parameters.get(pattern.name);
      return parameter ? satisfies(context, actual, parameter, state) : [];
    }

    case "array":
      return actual.kind === "array"
        ? align(context, pattern.elementType, actual.elementType, state)
        : [];

    case "named":
      if (!containsTypeParameter(pattern)) {
        return typeRefsEqual(pattern, actual) ? [state] : [];
      }
      return actual.kind === "named" && actual.name === pattern.name
        ? alignArguments(
            context,
            pattern.typeArguments,
            actual.typeArguments,
            state
          )
        : [];
  }
};

/**
 * Naked `where T : U` constraints, checked once every parameter is bound.
 */
const satisfiesNakedConstraints = (
  graph: TypeGraph,
  state: SolveState,
  parameters: readonly GenericParameter[]
): boolean =>
  parameters.every((parameter) => {
    const type = state.get(parameter.name);
    return parameter.constraintTypes.every((constraint) => {
      if (constraint.kind !== "typeParameter") return true;
      const other = state.get(constraint.name);
      return !type || !other || isAssignable(graph, type, other).matched;
    });
  });

export const bindingKey = (binding: Binding): string =>
  binding
    .map((entry) => `${entry.parameter.name}=${typeRefKey(entry.type)}`)
    .join(";");

/**
 * Every distinct, complete binding of `parameters` for `candidate`.
 * An empty result means the candidate cannot satisfy the signature.
 */
export const solve = (
  graph: TypeGraph,
  candidate: TypeRef,
  parameters: readonly GenericParameter[],
  options: SolveOptions = {}
): readonly Binding[] => {
  const ordered = [...parameters].sort((a, b) => a.ordinal - b.ordinal);
  const [first] = ordered;
  if (!first) return [[]];

  const context: SolveContext = {
    graph,
    parameters: new Map(ordered.map((param) => [param.name, param])),
  };

  const states = satisfies(context, candidate, first, new Map(), options.focus);

  const seen = new Set<string>();
  const bindings: Binding[] = [];
  for (const state of states) {
    const entries: BindingEntry[] = [];
    for (const parameter of ordered) {
      const type = state.get(parameter.name);
      if (!type) break;
      entries.push({ parameter, type });
    }
    // Parameters no constraint reaches are never inferred
    if (entries.length !== ordered.length) continue;
    if (!satisfiesNakedConstraints(graph, state, ordered)) continue;

    const key = bindingKey(entries);
    if (seen.has(key)) continue;
    seen.add(key);
    bindings.push(entries);
  }

  return bindings;
};

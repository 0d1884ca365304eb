import {
  MetaModel,
  ModelError,
  encodeSnapshot,
  placeId,
  transitionId,
} from "@tokenflow/model";
import type {
  ModelEvents,
  ModelSnapshot,
  ModelVar,
  NodeHandle,
  PlaceHandle,
  PlaceInput,
  RoleId,
  TransitionHandle,
} from "@tokenflow/model";
import type { Evaluator, EvaluatorFactory } from "./evaluator.js";

/** Builders handed to a model declaration. */
export type DeclarationApi = {
  role(name: string): RoleId;
  cell(name: string, input?: PlaceInput): PlaceHandle;
  fn(name: string, input: { role: RoleId }): TransitionHandle;
  /**
   * Connect two nodes and return the first, so declarations chain.
   * Which end consumes and which produces is decided by the node kinds.
   */
  arc<N extends NodeHandle>(node: N, weight: number, other: NodeHandle): N;
  /** Block `other` while `node` holds at least `weight` tokens. */
  inhibitor<N extends NodeHandle>(node: N, weight: number, other: NodeHandle): N;
};

export type ModelDeclaration = (api: DeclarationApi) => void;

export type DefineModelOptions = {
  events?: ModelEvents;
};

export type ModelDefinition = {
  readonly schema: string;
  readonly model: MetaModel;
  /** Start a new overlay var. */
  var(): ModelVar;
  /** Vars not yet applied. */
  vars(): readonly ModelVar[];
  /** Freeze, apply the overlay and export. Later calls return the same snapshot. */
  compile(): ModelSnapshot;
  /** Bytes of compile(). */
  marshal(): Uint8Array;
  stateMachine<E extends Evaluator>(factory: EvaluatorFactory<E>): E;
};

/**
 * Builds a model from a declaration function. Arcs may reference nodes in
 * any order; they are checked when the model is compiled.
 */
export function defineModel(
  schema: string,
  declaration: ModelDeclaration,
  options: DefineModelOptions = {},
): ModelDefinition {
  const model = new MetaModel(schema, { events: options.events });

  declaration({
    role: (name) => model.role(name),
    cell: (name, input) => model.place(placeId(name), input),
    fn: (name, input) => model.transition(transitionId(name), input),
    arc(node, weight, other) {
      model.addArc(node, other, weight, "normal");
      return node;
    },
    inhibitor(node, weight, other) {
      if (node.kind !== "place" || other.kind !== "transition") {
        throw new ModelError(
          "malformed-arc",
          `Inhibitor arcs must run from a place to a transition, got ${node.kind} -> ${other.kind}`,
        );
      }
      model.addArc(node, other, weight, "inhibitor");
      return node;
    },
  });

  let compiled: ModelSnapshot | null = null;

  function compile(): ModelSnapshot {
    if (compiled) return compiled;
    model.freeze();
    if (!model.isSealed()) model.applyOverlay();
    compiled = model.snapshot();
    return compiled;
  }

  return {
    schema,
    model,
    var: () => model.newVar(),
    vars: () => model.pendingVars(),
    compile,
    marshal: () => encodeSnapshot(compile()),
    stateMachine: (factory) => factory(compile()),
  };
}

/** Load a compiled model. It is frozen and takes no further vars. */
export function unmarshal(bytes: Uint8Array): MetaModel {
  return MetaModel.fromBytes(bytes);
}

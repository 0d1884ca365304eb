import type { PlaceId, RoleId, TransitionId } from "./ids.js";
import { placeId, roleId, transitionId } from "./ids.js";
import type {
  Arc,
  ArcKind,
  ModelSnapshot,
  NodeHandle,
  Place,
  PlaceHandle,
  PlaceInput,
  Transition,
  TransitionHandle,
  TransitionInput,
} from "./types.js";
import { ModelError, assertCount } from "./errors.js";
import { ModelVar } from "./vars.js";
import type { OverlayPatch } from "./vars.js";
import {
  decodeSnapshot,
  encodeSnapshot,
  parseSnapshot,
  toSnapshot,
} from "./snapshot.js";

export type ModelEvents = {
  onFreeze?: (schema: string, placeCount: number, transitionCount: number) => void;
  onOverlay?: (schema: string, binding: ModelVar, patch: OverlayPatch) => void;
};

export type ModelOptions = {
  events?: ModelEvents;
};

let nextModelId = 1;

/**
 * Scaffolding for a token-flow net. Places and transitions live in dense
 * arenas; handles are tagged indices into them. Arcs are kept in a ledger
 * and only resolved into delta vectors by freeze().
 */
export class MetaModel {
  readonly schema: string;
  private readonly id = nextModelId++;
  private readonly events: ModelEvents;

  private readonly places: Place[] = [];
  private readonly placeIndex = new Map<string, number>();
  private readonly transitions: Transition[] = [];
  private readonly transitionIndex = new Map<string, number>();

  private arcs: Arc[] = [];
  private vars: ModelVar[] = [];
  private frozen = false;
  private sealed = false;

  constructor(schema: string, options: ModelOptions = {}) {
    this.schema = schema;
    this.events = options.events ?? {};
  }

  /** Number of places, which is also the length of every delta. */
  get vectorSize(): number {
    return this.places.length;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /** True once the overlay has been applied, or the model was imported. */
  isSealed(): boolean {
    return this.sealed;
  }

  // -------------------------------------------------------------------------
  // Declarations
  // -------------------------------------------------------------------------

  role(name: string): RoleId {
    this.assertNotFrozen();
    return roleId(name);
  }

  /**
   * Declare a place. Re-declaring an id overwrites its initial and capacity
   * but keeps the offset it was first given.
   */
  place(id: PlaceId, input: PlaceInput = {}): PlaceHandle {
    this.assertNotFrozen();
    assertIdentifier(id, "Place");
    const initial = assertCount(input.initial ?? 0, `Initial of place "${id}"`);
    const capacity = assertCount(input.capacity ?? 0, `Capacity of place "${id}"`);

    let index = this.placeIndex.get(id);
    if (index === undefined) {
      index = this.places.length;
      this.placeIndex.set(id, index);
      this.places.push({ id, offset: index, initial, capacity });
    } else {
      this.places[index] = { id, offset: index, initial, capacity };
    }

    const handle: PlaceHandle = { kind: "place", index, model: this.id };
    return Object.freeze(handle);
  }

  transition(id: TransitionId, input: TransitionInput): TransitionHandle {
    this.assertNotFrozen();
    assertIdentifier(id, "Transition");

    let index = this.transitionIndex.get(id);
    if (index === undefined) {
      index = this.transitions.length;
      this.transitionIndex.set(id, index);
      this.transitions.push({ id, role: input.role, guards: new Map() });
    } else {
      this.transitions[index] = { id, role: input.role, guards: new Map() };
    }

    const handle: TransitionHandle = { kind: "transition", index, model: this.id };
    return Object.freeze(handle);
  }

  /** Record an arc. Orientation is not checked until freeze. */
  addArc(
    source: NodeHandle,
    target: NodeHandle,
    weight: number,
    kind: ArcKind = "normal",
  ): void {
    this.assertNotFrozen();
    assertCount(weight, "Arc weight");
    this.arcs.push({ source, target, weight, kind });
  }

  newVar(): ModelVar {
    this.assertNotSealed();
    const v = new ModelVar();
    this.vars.push(v);
    return v;
  }

  // -------------------------------------------------------------------------
  // Freeze
  // -------------------------------------------------------------------------

  /**
   * Resolve every arc into its transition's delta and lock the shape.
   * Calling it again on a frozen model does nothing.
   */
  freeze(): this {
    if (this.frozen) return this;

    const size = this.places.length;
    const deltas = this.transitions.map(() => new Array<number>(size).fill(0));
    const guards = this.transitions.map(() => new Map<PlaceId, number>());

    this.arcs.forEach((arc, i) => {
      const source = this.resolveHandle(arc.source, i);
      const target = this.resolveHandle(arc.target, i);

      if (source.kind === "place" && target.kind === "transition") {
        if (arc.kind === "inhibitor") {
          guards[target.index]?.set(source.place.id, arc.weight);
        } else {
          setSlot(deltas, target.index, source.place.offset, 0 - arc.weight);
        }
        return;
      }

      if (source.kind === "transition" && target.kind === "place" && arc.kind === "normal") {
        setSlot(deltas, source.index, target.place.offset, arc.weight);
        return;
      }

      throw new ModelError(
        "malformed-arc",
        `Arc #${i} (${arc.kind}) from ${describe(source)} to ${describe(target)}: ` +
          (arc.kind === "inhibitor"
            ? "inhibitor arcs must run from a place to a transition"
            : "arcs must connect a place and a transition"),
      );
    });

    this.transitions.forEach((t, i) => {
      t.delta = deltas[i];
      t.guards = guards[i] ?? new Map();
    });
    this.arcs = [];
    this.frozen = true;
    this.events.onFreeze?.(this.schema, this.places.length, this.transitions.length);
    return this;
  }

  // -------------------------------------------------------------------------
  // Overlay
  // -------------------------------------------------------------------------

  /**
   * Resolve every pending var, in declaration order, and write the values
   * onto the frozen model. Nothing is written unless every var resolves.
   */
  applyOverlay(): this {
    this.assertFrozen("apply overlay");
    this.assertNotSealed();

    const pending = this.vars;
    const patches = pending.map((v) => v.resolve(this));

    for (const patch of patches) {
      if (patch.kind === "weight") {
        const t = this.transitionAt(patch.transition);
        if (t.delta) t.delta[patch.offset] = patch.value;
      } else {
        const p = this.placeAt(patch.place);
        p[patch.kind] = patch.value;
      }
    }
    this.vars = [];
    this.sealed = true;

    // Events fire only after the overlay is committed.
    patches.forEach((patch, i) => {
      const binding = pending[i];
      if (binding) this.events.onOverlay?.(this.schema, binding, patch);
    });
    return this;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  hasPlace(id: string): boolean {
    return this.placeIndex.has(id);
  }

  hasTransition(id: string): boolean {
    return this.transitionIndex.has(id);
  }

  getPlace(id: string): Readonly<Place> | undefined {
    const index = this.placeIndex.get(id);
    const p = index === undefined ? undefined : this.places[index];
    return p && { ...p };
  }

  getTransition(id: string): Readonly<Transition> | undefined {
    const index = this.transitionIndex.get(id);
    const t = index === undefined ? undefined : this.transitions[index];
    return (
      t && {
        ...t,
        delta: t.delta && [...t.delta],
        guards: new Map(t.guards),
      }
    );
  }

  /** Place ids in offset order. */
  placeIds(): PlaceId[] {
    return this.places.map((p) => p.id);
  }

  /** Transition ids in declaration order. */
  transitionIds(): TransitionId[] {
    return this.transitions.map((t) => t.id);
  }

  pendingArcs(): readonly Arc[] {
    return [...this.arcs];
  }

  pendingVars(): readonly ModelVar[] {
    return [...this.vars];
  }

  delta(id: TransitionId): number[] {
    this.assertFrozen("read a delta");
    const t = this.transitionAt(id);
    return t.delta ? [...t.delta] : [];
  }

  /** Token counts in offset order; the evaluator's starting vector. */
  initialState(): number[] {
    this.assertFrozen("read the initial state");
    return this.places.map((p) => p.initial);
  }

  // -------------------------------------------------------------------------
  // Export / import
  // -------------------------------------------------------------------------

  /**
   * Deep-frozen plain projection for the evaluator. Vars that were never
   * applied are not part of it.
   */
  snapshot(): ModelSnapshot {
    this.assertFrozen("export");
    return toSnapshot(this.schema, this.places, this.transitions);
  }

  toBytes(): Uint8Array {
    return encodeSnapshot(this.snapshot());
  }

  static fromBytes(bytes: Uint8Array): MetaModel {
    return MetaModel.restore(decodeSnapshot(bytes));
  }

  static fromSnapshot(value: unknown): MetaModel {
    return MetaModel.restore(parseSnapshot(value));
  }

  /** An imported model is frozen and sealed: no declarations, no overlay. */
  private static restore(snap: ModelSnapshot): MetaModel {
    const m = new MetaModel(snap.schema);

    const places = Object.entries(snap.places).sort(
      ([, a], [, b]) => a.offset - b.offset,
    );
    for (const [id, p] of places) {
      m.placeIndex.set(id, p.offset);
      m.places.push({
        id: placeId(id),
        offset: p.offset,
        initial: p.initial,
        capacity: p.capacity,
      });
    }

    for (const [id, t] of Object.entries(snap.transitions)) {
      m.transitionIndex.set(id, m.transitions.length);
      m.transitions.push({
        id: transitionId(id),
        role: roleId(t.role),
        delta: [...t.delta],
        guards: new Map(
          Object.entries(t.guards ?? {}).map(([p, w]) => [placeId(p), w]),
        ),
      });
    }

    m.frozen = true;
    m.sealed = true;
    return m;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private assertNotFrozen(): void {
    if (this.frozen) {
      throw new ModelError(
        "already-frozen",
        `Model "${this.schema}" is frozen and cannot be altered`,
      );
    }
  }

  private assertFrozen(action: string): void {
    if (!this.frozen) {
      throw new ModelError(
        "not-frozen",
        `Model "${this.schema}" must be frozen to ${action}`,
      );
    }
  }

  private assertNotSealed(): void {
    if (this.sealed) {
      throw new ModelError(
        "sealed",
        `Model "${this.schema}" has no pending overlay: vars were already applied or it was imported`,
      );
    }
  }

  private placeAt(id: string): Place {
    const index = this.placeIndex.get(id);
    const p = index === undefined ? undefined : this.places[index];
    if (!p) {
      throw new ModelError("unresolved-reference", `Unknown place "${id}"`);
    }
    return p;
  }

  private transitionAt(id: string): Transition {
    const index = this.transitionIndex.get(id);
    const t = index === undefined ? undefined : this.transitions[index];
    if (!t) {
      throw new ModelError("unresolved-reference", `Unknown transition "${id}"`);
    }
    return t;
  }

  private resolveHandle(handle: NodeHandle, arcIndex: number): ResolvedNode {
    if (handle.model !== this.id) {
      throw new ModelError(
        "malformed-arc",
        `Arc #${arcIndex} references a ${handle.kind} declared on another model`,
      );
    }
    if (handle.kind === "place") {
      const place = this.places[handle.index];
      if (place) return { kind: "place", place };
    } else {
      const transition = this.transitions[handle.index];
      if (transition) return { kind: "transition", index: handle.index, transition };
    }
    throw new ModelError(
      "malformed-arc",
      `Arc #${arcIndex} references unknown ${handle.kind} #${handle.index}`,
    );
  }
}

type ResolvedNode =
  | { kind: "place"; place: Place }
  | { kind: "transition"; index: number; transition: Transition };

// Snapshot records are plain objects keyed by id.
const RESERVED_IDS = new Set(["__proto__"]);

function assertIdentifier(id: string, what: string): void {
  if (RESERVED_IDS.has(id)) {
    throw new ModelError("invalid-value", `${what} id "${id}" is reserved`);
  }
}

function setSlot(deltas: number[][], t: number, offset: number, value: number): void {
  const delta = deltas[t];
  if (delta) delta[offset] = value;
}

function describe(node: ResolvedNode): string {
  return node.kind === "place"
    ? `place "${node.place.id}"`
    : `transition "${node.transition.id}"`;
}

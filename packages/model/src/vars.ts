import type { PlaceId, TransitionId } from "./ids.js";
import type { Place, Transition } from "./types.js";
import { ModelError, assertCount } from "./errors.js";

export type VarKind = "initial" | "capacity" | "weight";

/**
 * "infer" probes the registry to find which side is the transition.
 * The other two name the direction and skip the probe.
 */
export type WeightDirection =
  | "infer"
  | "place-to-transition"
  | "transition-to-place";

export type VarRef =
  | { kind: "initial" | "capacity"; target: string }
  | {
      kind: "weight";
      source: string;
      target: string;
      direction: WeightDirection;
    };

export type ValueFn = () => number;

/** A resolved var, ready to be written onto the frozen model. */
export type OverlayPatch =
  | { kind: "initial" | "capacity"; place: PlaceId; value: number }
  | { kind: "weight"; transition: TransitionId; offset: number; value: number };

export type NodeLookup = {
  getPlace(id: string): Readonly<Place> | undefined;
  getTransition(id: string): Readonly<Transition> | undefined;
};

/**
 * Deferred patch onto a frozen model. Declared unresolved, then resolved
 * exactly once when the overlay is applied.
 */
export class ModelVar {
  private _ref: VarRef | null = null;
  private _label: string | null = null;
  private _description: string | null = null;
  private fn: ValueFn | null = null;
  private value: number | null = null;

  get ref(): VarRef | null {
    return this._ref;
  }

  get kind(): VarKind | null {
    return this._ref?.kind ?? null;
  }

  get label(): string | null {
    return this._label;
  }

  get description(): string | null {
    return this._description;
  }

  get bound(): boolean {
    return this.fn !== null;
  }

  /** Set the max capacity of a place. */
  capacity(place: PlaceId): this {
    return this.target({ kind: "capacity", target: place });
  }

  /** Set the starting token count of a place. */
  initial(place: PlaceId): this {
    return this.target({ kind: "initial", target: place });
  }

  /** Set the weight of the arc between two nodes, either orientation. */
  weight(source: string, target: string): this {
    return this.target({ kind: "weight", source, target, direction: "infer" });
  }

  /** Set the weight of a transition -> place arc. */
  produce(transition: TransitionId, place: PlaceId): this {
    return this.target({
      kind: "weight",
      source: transition,
      target: place,
      direction: "transition-to-place",
    });
  }

  /** Set the weight of a place -> transition arc. */
  consume(place: PlaceId, transition: TransitionId): this {
    return this.target({
      kind: "weight",
      source: place,
      target: transition,
      direction: "place-to-transition",
    });
  }

  labelled(text: string): this {
    this._label = text;
    return this;
  }

  describe(text: string): this {
    this._description = text;
    return this;
  }

  bind(fn: ValueFn): void {
    if (this.fn) {
      throw new ModelError("invalid-binding", `${this.name()} is already bound`);
    }
    this.fn = fn;
  }

  /** Human-readable name for events and error messages. */
  name(): string {
    if (this._label) return `var '${this._label}'`;
    const ref = this._ref;
    if (!ref) return "var (no kind)";
    if (ref.kind === "weight") return `${ref.kind} var ${ref.source} -> ${ref.target}`;
    return `${ref.kind} var ${ref.target}`;
  }

  resolve(lookup: NodeLookup): OverlayPatch {
    const ref = this._ref;
    if (!ref) {
      throw new ModelError(
        "invalid-binding",
        `${this.name()} was never given capacity, initial or weight`,
      );
    }
    if (!this.fn) {
      throw new ModelError("unbound-variable", `${this.name()} is unbound`);
    }

    if (ref.kind === "weight") {
      const { transition, place, sign } = resolveArc(ref, lookup, this.name());
      const value = this.evaluate(this.fn);
      return {
        kind: "weight",
        transition: transition.id,
        offset: place.offset,
        value: sign === 1 ? value : 0 - value,
      };
    }

    const place = lookup.getPlace(ref.target);
    if (!place) {
      throw new ModelError(
        "unresolved-reference",
        `${this.name()} references unknown place "${ref.target}"`,
      );
    }
    return {
      kind: ref.kind,
      place: place.id,
      value: this.evaluate(this.fn),
    };
  }

  /** The value function runs once; a retried overlay reuses its result. */
  private evaluate(fn: ValueFn): number {
    if (this.value === null) this.value = assertCount(fn(), this.name());
    return this.value;
  }

  private target(ref: VarRef): this {
    if (this._ref) {
      throw new ModelError(
        "invalid-binding",
        `${this.name()} already has a kind; declare a new var instead`,
      );
    }
    this._ref = ref;
    return this;
  }
}

function resolveArc(
  ref: Extract<VarRef, { kind: "weight" }>,
  lookup: NodeLookup,
  name: string,
): { transition: Readonly<Transition>; place: Readonly<Place>; sign: 1 | -1 } {
  let direction = ref.direction;
  if (direction === "infer") {
    if (lookup.getTransition(ref.source)) {
      direction = "transition-to-place";
    } else if (lookup.getTransition(ref.target)) {
      direction = "place-to-transition";
    } else {
      throw new ModelError(
        "unresolved-reference",
        `${name}: neither "${ref.source}" nor "${ref.target}" is a known transition`,
      );
    }
  }

  const [tName, pName] =
    direction === "transition-to-place"
      ? [ref.source, ref.target]
      : [ref.target, ref.source];

  const transition = lookup.getTransition(tName);
  if (!transition) {
    throw new ModelError(
      "unresolved-reference",
      `${name} references unknown transition "${tName}"`,
    );
  }
  const place = lookup.getPlace(pName);
  if (!place) {
    throw new ModelError(
      "unresolved-reference",
      `${name} references unknown place "${pName}"`,
    );
  }

  return {
    transition,
    place,
    sign: direction === "transition-to-place" ? 1 : -1,
  };
}

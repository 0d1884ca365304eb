import type { PlaceId, RoleId, TransitionId } from "./ids.js";

export type Place = {
  id: PlaceId;
  /** Position in the state vector. Assigned on first declaration, never changes. */
  offset: number;
  initial: number;
  /** Upper bound on tokens; 0 means unbounded. */
  capacity: number;
};

export type Transition = {
  id: TransitionId;
  role: RoleId;
  /** Net token change per place, indexed by offset. Absent until freeze. */
  delta?: number[];
  /** Inhibitor thresholds: the transition is disabled while place >= weight. */
  guards: Map<PlaceId, number>;
};

export type PlaceInput = {
  initial?: number;
  capacity?: number;
};

export type TransitionInput = {
  role: RoleId;
};

/**
 * Tagged index into one model's node arenas. Carries the owning model's
 * identity so a handle from another model is caught at freeze.
 */
export type PlaceHandle = {
  readonly kind: "place";
  readonly index: number;
  readonly model: number;
};

export type TransitionHandle = {
  readonly kind: "transition";
  readonly index: number;
  readonly model: number;
};

export type NodeHandle = PlaceHandle | TransitionHandle;

export type ArcKind = "normal" | "inhibitor";

export type Arc = {
  source: NodeHandle;
  target: NodeHandle;
  weight: number;
  kind: ArcKind;
};

export type PlaceSnapshot = {
  initial: number;
  capacity: number;
  offset: number;
};

export type TransitionSnapshot = {
  delta: number[];
  role: string;
  guards?: Record<string, number>;
};

/**
 * Plain, deep-frozen projection of a compiled model. This is the only
 * structure an evaluator needs.
 */
export type ModelSnapshot = {
  schema: string;
  places: Record<string, PlaceSnapshot>;
  transitions: Record<string, TransitionSnapshot>;
};

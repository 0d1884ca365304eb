// Identifiers
export { placeId, transitionId, roleId } from "./ids.js";
export type { PlaceId, TransitionId, RoleId } from "./ids.js";

// Model types
export type {
  Place,
  Transition,
  PlaceInput,
  TransitionInput,
  PlaceHandle,
  TransitionHandle,
  NodeHandle,
  ArcKind,
  Arc,
  PlaceSnapshot,
  TransitionSnapshot,
  ModelSnapshot,
} from "./types.js";

// Errors
export { ModelError, isModelError } from "./errors.js";
export type { ModelErrorKind, Result } from "./errors.js";

// Registry, ledger, freeze and overlay
export { MetaModel } from "./model.js";
export type { ModelEvents, ModelOptions } from "./model.js";

// Vars
export { ModelVar } from "./vars.js";
export type {
  VarKind,
  VarRef,
  WeightDirection,
  ValueFn,
  OverlayPatch,
} from "./vars.js";

// Export / import
export {
  snapshotSchema,
  parseSnapshot,
  encodeSnapshot,
  decodeSnapshot,
} from "./snapshot.js";

// Fallible wrappers
export { compile, overlay } from "./compile.js";

// Persistence
export {
  createSnapshotStore,
  DEFAULT_SNAPSHOT_TABLE,
} from "./persistence/index.js";
export type { SnapshotStore, SnapshotStoreOptions } from "./persistence/index.js";

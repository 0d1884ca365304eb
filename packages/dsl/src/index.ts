export { defineModel, unmarshal } from "./declare.js";
export type {
  DeclarationApi,
  ModelDeclaration,
  DefineModelOptions,
  ModelDefinition,
} from "./declare.js";

export { logEvents } from "./events.js";
export type { EventLogger } from "./events.js";

export type { Evaluator, EvaluatorFactory, TransformResult } from "./evaluator.js";

export {
  MetaModel,
  ModelError,
  compile,
  overlay,
  placeId,
  transitionId,
  roleId,
} from "@tokenflow/model";
export type {
  ModelSnapshot,
  ModelVar,
  ModelEvents,
  PlaceId,
  TransitionId,
  RoleId,
  PlaceHandle,
  TransitionHandle,
  Result,
} from "@tokenflow/model";

import type { ModelSnapshot } from "@tokenflow/model";

export type TransformResult = {
  /** Next state. Returned even when `error` is set, unclamped. */
  state: number[];
  /** Role required to fire the action. */
  role: string;
  error: Error | null;
};

/**
 * Executes transitions against a state vector. Implementations live
 * outside this repository; a compiled snapshot is all they are given.
 */
export interface Evaluator {
  initialState(): number[];
  transform(state: readonly number[], action: string, multiplier: number): TransformResult;
}

export type EvaluatorFactory<E extends Evaluator = Evaluator> = (
  snapshot: ModelSnapshot,
) => E;

import type { Evaluator, ModelSnapshot, TransformResult } from "@tokenflow/dsl";

/**
 * In-process stand-in for the external evaluator, used by the model tests.
 * Adds delta * multiplier to the state and reports inhibited, underflow and
 * overflow the way the production engine does.
 */
export class ReferenceEvaluator implements Evaluator {
  private readonly offsets = new Map<string, number>();
  private readonly capacity: number[] = [];
  private readonly initial: number[] = [];

  constructor(private readonly snapshot: ModelSnapshot) {
    for (const [id, p] of Object.entries(snapshot.places)) {
      this.offsets.set(id, p.offset);
      this.capacity[p.offset] = p.capacity;
      this.initial[p.offset] = p.initial;
    }
  }

  initialState(): number[] {
    return [...this.initial];
  }

  transform(state: readonly number[], action: string, multiplier: number): TransformResult {
    const t = this.snapshot.transitions[action];
    if (!t) {
      return { state: [...state], role: "", error: new Error(`unknown action ${action}`) };
    }

    for (const [place, weight] of Object.entries(t.guards ?? {})) {
      const offset = this.offsets.get(place) ?? -1;
      if ((state[offset] ?? 0) >= weight) {
        return { state: [...state], role: t.role, error: new Error("inhibited") };
      }
    }

    const next = [...state];
    let error: Error | null = null;
    for (let i = 0; i < next.length; i++) {
      const out = (next[i] ?? 0) + (t.delta[i] ?? 0) * multiplier;
      const cap = this.capacity[i] ?? 0;
      next[i] = out;
      if (error) continue;
      if (out < 0) error = new Error("underflow");
      else if (cap > 0 && out > cap) error = new Error("overflow");
    }

    return { state: next, role: t.role, error };
  }
}

export function referenceEvaluator(snapshot: ModelSnapshot): ReferenceEvaluator {
  return new ReferenceEvaluator(snapshot);
}

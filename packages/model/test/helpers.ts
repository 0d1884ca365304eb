import { MetaModel } from "../src/model.js";
import type { ModelOptions } from "../src/model.js";
import { ModelError } from "../src/errors.js";
import { placeId, transitionId } from "../src/ids.js";

export const p0 = placeId("p0");
export const p1 = placeId("p1");
export const DEC0 = transitionId("DEC0");
export const DEC1 = transitionId("DEC1");
export const INC0 = transitionId("INC0");
export const INC1 = transitionId("INC1");

/** Two bounded counters: DECn consumes from pn, INCn produces into pn. */
export function counterModel(options?: ModelOptions): MetaModel {
  const m = new MetaModel("Counter", options);
  const user = m.role("default");

  const dec0 = m.transition(DEC0, { role: user });
  const dec1 = m.transition(DEC1, { role: user });
  const inc0 = m.transition(INC0, { role: user });
  const inc1 = m.transition(INC1, { role: user });

  const a = m.place(p0, { initial: 0 });
  const b = m.place(p1, { initial: 1 });

  m.addArc(a, dec0, 1);
  m.addArc(b, dec1, 1);
  m.addArc(inc0, a, 1);
  m.addArc(inc1, b, 1);
  return m;
}

export function errorOf(fn: () => unknown): ModelError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ModelError) return err;
    throw err;
  }
  throw new Error("expected a ModelError to be thrown");
}

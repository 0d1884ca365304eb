import { defineModel, placeId, transitionId } from "@tokenflow/dsl";
import type { ModelDefinition, ModelDeclaration, DefineModelOptions } from "@tokenflow/dsl";

export const INC0 = transitionId("INC0");
export const DEC0 = transitionId("DEC0");
export const INC1 = transitionId("INC1");
export const DEC1 = transitionId("DEC1");

export const p0 = placeId("p0");
export const p1 = placeId("p1");

export const user = "default";

/** Two counters, each with an increment and a decrement. */
export const declaration: ModelDeclaration = ({ role, cell, fn, arc }) => {
  const userRole = role(user);

  const dec0 = fn(DEC0, { role: userRole });
  const dec1 = fn(DEC1, { role: userRole });

  const p00 = arc(cell(p0, { initial: 0 }), 1, dec0);
  const p01 = arc(cell(p1, { initial: 1 }), 1, dec1);

  arc(fn(INC0, { role: userRole }), 1, p00);
  arc(fn(INC1, { role: userRole }), 1, p01);
};

export function createCounter(options?: DefineModelOptions): ModelDefinition {
  return defineModel("Counter", declaration, options);
}

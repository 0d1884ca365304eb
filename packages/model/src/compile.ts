import type { MetaModel } from "./model.js";
import type { Result } from "./errors.js";
import { isModelError } from "./errors.js";

function attempt(model: MetaModel, step: (m: MetaModel) => MetaModel): Result<MetaModel> {
  try {
    return { ok: true, value: step(model) };
  } catch (err) {
    if (isModelError(err)) return { ok: false, error: err };
    throw err;
  }
}

/** freeze() as a result instead of a throw. */
export function compile(model: MetaModel): Result<MetaModel> {
  return attempt(model, (m) => m.freeze());
}

/** applyOverlay() as a result instead of a throw. */
export function overlay(model: MetaModel): Result<MetaModel> {
  return attempt(model, (m) => m.applyOverlay());
}

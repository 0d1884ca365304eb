import { z } from "zod";
import type {
  ModelSnapshot,
  Place,
  PlaceSnapshot,
  Transition,
  TransitionSnapshot,
} from "./types.js";
import { ModelError } from "./errors.js";

const count = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

const placeSchema = z.object({
  initial: count,
  capacity: count,
  offset: count,
});

const transitionSchema = z.object({
  delta: z.array(
    z.number().int().min(-Number.MAX_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER),
  ),
  role: z.string(),
  guards: z.record(count).optional(),
});

/**
 * Wire shape of a compiled model. Offsets must be a permutation of
 * 0..n-1 and every delta must be n long.
 */
export const snapshotSchema = z
  .object({
    schema: z.string(),
    places: z.record(placeSchema),
    transitions: z.record(transitionSchema),
  })
  .superRefine((snap, ctx) => {
    const size = Object.keys(snap.places).length;
    const seen = new Set<number>();

    for (const [id, place] of Object.entries(snap.places)) {
      if (place.offset >= size || seen.has(place.offset)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["places", id, "offset"],
          message: `offset ${place.offset} is not unique within 0..${size - 1}`,
        });
      }
      seen.add(place.offset);
    }

    for (const [id, t] of Object.entries(snap.transitions)) {
      if (t.delta.length !== size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["transitions", id, "delta"],
          message: `delta has length ${t.delta.length}, expected ${size}`,
        });
      }
      for (const p of Object.keys(t.guards ?? {})) {
        if (!Object.hasOwn(snap.places, p)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["transitions", id, "guards", p],
            message: `guard references unknown place "${p}"`,
          });
        }
      }
    }
  });

export function toSnapshot(
  schema: string,
  places: readonly Place[],
  transitions: readonly Transition[],
): ModelSnapshot {
  const placeOut: Record<string, PlaceSnapshot> = Object.fromEntries(
    [...places]
      .sort((a, b) => a.offset - b.offset)
      .map((p): [string, PlaceSnapshot] => [
        p.id,
        { initial: p.initial, capacity: p.capacity, offset: p.offset },
      ]),
  );

  const transitionOut: Record<string, TransitionSnapshot> = Object.fromEntries(
    transitions.map((t): [string, TransitionSnapshot] => {
      if (!t.delta) {
        throw new ModelError("not-frozen", `Transition "${t.id}" has no delta`);
      }
      const out: TransitionSnapshot = {
        delta: [...t.delta],
        role: t.role,
        ...(t.guards.size > 0 && { guards: Object.fromEntries(t.guards) }),
      };
      return [t.id, out];
    }),
  );

  return deepFreeze({ schema, places: placeOut, transitions: transitionOut });
}

export function parseSnapshot(value: unknown): ModelSnapshot {
  const parsed = snapshotSchema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    throw new ModelError(
      "invalid-snapshot",
      `Invalid model snapshot${where}: ${first?.message ?? "unknown error"}`,
    );
  }
  return parsed.data;
}

export function encodeSnapshot(snapshot: ModelSnapshot): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(snapshot));
}

export function decodeSnapshot(bytes: Uint8Array): ModelSnapshot {
  let value: unknown;
  try {
    value = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new ModelError(
      "invalid-snapshot",
      `Model snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseSnapshot(value);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

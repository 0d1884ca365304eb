/**
 * Branded identifier types. Places, transitions and roles share one string
 * namespace on the wire but never mix in code.
 */

declare const __brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type PlaceId = Brand<string, "PlaceId">;
export type TransitionId = Brand<string, "TransitionId">;
export type RoleId = Brand<string, "RoleId">;

export function placeId(id: string): PlaceId {
  return id as PlaceId;
}

export function transitionId(id: string): TransitionId {
  return id as TransitionId;
}

export function roleId(id: string): RoleId {
  return id as RoleId;
}

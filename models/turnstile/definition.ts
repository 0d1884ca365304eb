import { defineModel, placeId, transitionId } from "@tokenflow/dsl";
import type { ModelDefinition, ModelDeclaration, ModelEvents } from "@tokenflow/dsl";

export const locked = placeId("locked");
export const unlocked = placeId("unlocked");
export const coins = placeId("coins");
export const passes = placeId("passes");
export const broken = placeId("broken");

export const coin = transitionId("coin");
export const push = transitionId("push");
export const empty = transitionId("empty");
export const fault = transitionId("fault");
export const repair = transitionId("repair");

export const declaration: ModelDeclaration = ({ role, cell, fn, arc, inhibitor }) => {
  const visitor = role("visitor");
  const operator = role("operator");

  const lockedCell = cell(locked, { initial: 1 });
  const unlockedCell = cell(unlocked);
  const coinBox = cell(coins);
  const passCount = cell(passes);
  const brokenCell = cell(broken);

  const coinFn = fn(coin, { role: visitor });
  arc(lockedCell, 1, coinFn);
  arc(coinFn, 1, unlockedCell);
  arc(coinFn, 1, coinBox);
  // a broken turnstile takes no coins
  inhibitor(brokenCell, 1, coinFn);

  const pushFn = fn(push, { role: visitor });
  arc(unlockedCell, 1, pushFn);
  arc(pushFn, 1, lockedCell);
  arc(pushFn, 1, passCount);

  arc(coinBox, 1, fn(empty, { role: operator }));
  arc(fn(fault, { role: operator }), 1, brokenCell);
  arc(brokenCell, 1, fn(repair, { role: operator }));
};

export type TurnstileOptions = {
  /** Coins the box holds before it must be emptied. */
  slots?: number;
  /** Coins taken out per `empty`. */
  batch?: number;
  events?: ModelEvents;
};

/** A coin-operated turnstile with a coin box sized at compile time. */
export function createTurnstile(options: TurnstileOptions = {}): ModelDefinition {
  const { slots = 3, batch = slots, events } = options;
  const def = defineModel("Turnstile", declaration, { events });

  def.var().labelled("coin-slots").describe("coin box capacity").capacity(coins).bind(() => slots);
  def.var().consume(coins, empty).bind(() => batch);

  return def;
}

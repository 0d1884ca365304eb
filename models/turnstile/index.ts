export {
  createTurnstile,
  declaration,
  locked,
  unlocked,
  coins,
  passes,
  broken,
  coin,
  push,
  empty,
  fault,
  repair,
} from "./definition.js";
export type { TurnstileOptions } from "./definition.js";

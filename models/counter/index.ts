export { createCounter, declaration, INC0, DEC0, INC1, DEC1, p0, p1, user } from "./definition.js";

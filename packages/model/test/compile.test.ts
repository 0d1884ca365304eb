import { describe, it, expect } from "vitest";
import { MetaModel } from "../src/model.js";
import { compile, overlay } from "../src/compile.js";
import { placeId } from "../src/ids.js";
import { counterModel, p0, INC0 } from "./helpers.js";

describe("compile", () => {
  it("returns the frozen model", () => {
    const m = counterModel();
    const result = compile(m);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBe(m);
      expect(result.value.delta(INC0)).toEqual([1, 0]);
    }
  });

  it("returns a malformed-arc error instead of throwing", () => {
    const m = new MetaModel("bad");
    const a = m.place(placeId("a"));
    m.addArc(a, a, 1);

    const result = compile(m);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("malformed-arc");
    }
    expect(m.isFrozen()).toBe(false);
  });

  it("lets errors from event handlers propagate", () => {
    const m = counterModel({
      events: {
        onFreeze: () => {
          throw new Error("listener failed");
        },
      },
    });
    expect(() => compile(m)).toThrow("listener failed");
  });
});

describe("overlay", () => {
  it("applies pending vars", () => {
    const m = counterModel();
    m.newVar().capacity(p0).bind(() => 5);
    m.freeze();

    const result = overlay(m);
    expect(result.ok).toBe(true);
    expect(m.getPlace(p0)?.capacity).toBe(5);
  });

  it("reports an unbound var", () => {
    const m = counterModel();
    m.newVar().capacity(p0);
    m.freeze();

    const result = overlay(m);
    expect(result).toEqual({ ok: false, error: expect.objectContaining({ kind: "unbound-variable" }) });
  });

  it("reports a model that is not frozen", () => {
    const result = overlay(counterModel());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("not-frozen");
    }
  });
});

import { describe, it, expect } from "vitest";
import { MetaModel } from "../src/model.js";
import { placeId, roleId, transitionId } from "../src/ids.js";
import { counterModel, errorOf, p0, INC0 } from "./helpers.js";

function overlaidCounter(): MetaModel {
  const m = counterModel();
  m.newVar().capacity(p0).bind(() => 5);
  m.newVar().initial(p0).bind(() => 1);
  m.newVar().weight(INC0, p0).bind(() => 2);
  return m.freeze().applyOverlay();
}

function bytesOf(json: string): Uint8Array {
  return new TextEncoder().encode(json);
}

describe("snapshot", () => {
  it("projects the frozen, overlaid model", () => {
    expect(overlaidCounter().snapshot()).toEqual({
      schema: "Counter",
      places: {
        p0: { initial: 1, capacity: 5, offset: 0 },
        p1: { initial: 1, capacity: 0, offset: 1 },
      },
      transitions: {
        DEC0: { delta: [-1, 0], role: "default" },
        DEC1: { delta: [0, -1], role: "default" },
        INC0: { delta: [2, 0], role: "default" },
        INC1: { delta: [0, 1], role: "default" },
      },
    });
  });

  it("is deep-frozen", () => {
    const snap = overlaidCounter().snapshot();
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.places)).toBe(true);
    expect(Object.isFrozen(snap.transitions["INC0"]?.delta)).toBe(true);
  });

  it("does not change when the model is read again", () => {
    const m = overlaidCounter();
    const first = m.snapshot();
    m.delta(INC0)[0] = 10;
    expect(m.snapshot()).toEqual(first);
  });

  it("includes guards only where an inhibitor was declared", () => {
    const m = new MetaModel("guarded");
    const user = m.role("default");
    const lock = m.place(placeId("lock"));
    const out = m.place(placeId("out"));
    const go = m.transition(transitionId("go"), { role: user });
    const reset = m.transition(transitionId("reset"), { role: user });
    m.addArc(lock, go, 1, "inhibitor");
    m.addArc(go, out, 1);
    m.addArc(out, reset, 1);

    const snap = m.freeze().snapshot();
    expect(snap.transitions["go"]).toEqual({ delta: [0, 1], role: "default", guards: { lock: 1 } });
    expect(snap.transitions["reset"]).toEqual({ delta: [0, -1], role: "default" });
    expect(Object.keys(snap.transitions["reset"] ?? {})).toEqual(["delta", "role"]);
  });
});

describe("toBytes / fromBytes", () => {
  it("encodes the snapshot as JSON", () => {
    const m = new MetaModel("tiny");
    const a = m.place(placeId("a"), { initial: 2, capacity: 3 });
    const t = m.transition(transitionId("t"), { role: roleId("admin") });
    m.addArc(a, t, 1);
    m.freeze();

    expect(new TextDecoder().decode(m.toBytes())).toBe(
      '{"schema":"tiny","places":{"a":{"initial":2,"capacity":3,"offset":0}},' +
        '"transitions":{"t":{"delta":[-1],"role":"admin"}}}',
    );
  });

  it("round-trips byte for byte", () => {
    const bytes = overlaidCounter().toBytes();
    const again = MetaModel.fromBytes(bytes).toBytes();
    expect(again).toEqual(bytes);
    expect(MetaModel.fromBytes(again).toBytes()).toEqual(bytes);
  });

  it("round-trips numeric place ids with their offsets", () => {
    const m = new MetaModel("numeric");
    const user = m.role("default");
    const ten = m.place(placeId("10"), { initial: 1 });
    const two = m.place(placeId("2"));
    const t = m.transition(transitionId("move"), { role: user });
    m.addArc(ten, t, 1);
    m.addArc(t, two, 1);
    const bytes = m.freeze().toBytes();

    const loaded = MetaModel.fromBytes(bytes);
    expect(loaded.toBytes()).toEqual(bytes);
    expect(loaded.getPlace("10")?.offset).toBe(0);
    expect(loaded.getPlace("2")?.offset).toBe(1);
    expect(loaded.placeIds()).toEqual(["10", "2"]);
    expect(loaded.delta(transitionId("move"))).toEqual([-1, 1]);
  });

  it("yields a frozen, sealed model with nothing pending", () => {
    const loaded = MetaModel.fromBytes(overlaidCounter().toBytes());

    expect(loaded.schema).toBe("Counter");
    expect(loaded.isFrozen()).toBe(true);
    expect(loaded.isSealed()).toBe(true);
    expect(loaded.pendingArcs()).toEqual([]);
    expect(loaded.pendingVars()).toEqual([]);
    expect(loaded.initialState()).toEqual([1, 1]);
    expect(errorOf(() => loaded.place(placeId("p2"))).kind).toBe("already-frozen");
    expect(errorOf(() => loaded.newVar()).kind).toBe("sealed");
    expect(errorOf(() => loaded.applyOverlay()).kind).toBe("sealed");
  });

  it("restores guards", () => {
    const bytes = bytesOf(
      '{"schema":"g","places":{"a":{"initial":0,"capacity":0,"offset":0}},' +
        '"transitions":{"t":{"delta":[0],"role":"r","guards":{"a":3}}}}',
    );
    const loaded = MetaModel.fromBytes(bytes);
    expect(loaded.getTransition("t")?.guards).toEqual(new Map([["a", 3]]));
    expect(loaded.toBytes()).toEqual(bytes);
  });

  it("accepts a plain object", () => {
    const loaded = MetaModel.fromSnapshot(overlaidCounter().snapshot());
    expect(loaded.delta(INC0)).toEqual([2, 0]);
  });
});

describe("invalid snapshots", () => {
  it("rejects bytes that are not JSON", () => {
    const err = errorOf(() => MetaModel.fromBytes(bytesOf("not json")));
    expect(err.kind).toBe("invalid-snapshot");
    expect(err.message).toMatch(/^Model snapshot is not valid JSON: /);
  });

  it("rejects a delta of the wrong length", () => {
    const err = errorOf(() =>
      MetaModel.fromSnapshot({
        schema: "s",
        places: {
          a: { initial: 0, capacity: 0, offset: 0 },
          b: { initial: 0, capacity: 0, offset: 1 },
        },
        transitions: { t: { delta: [1], role: "r" } },
      }),
    );
    expect(err.kind).toBe("invalid-snapshot");
    expect(err.message).toBe(
      "Invalid model snapshot at transitions.t.delta: delta has length 1, expected 2",
    );
  });

  it("rejects duplicate offsets", () => {
    const err = errorOf(() =>
      MetaModel.fromSnapshot({
        schema: "s",
        places: {
          a: { initial: 0, capacity: 0, offset: 0 },
          b: { initial: 0, capacity: 0, offset: 0 },
        },
        transitions: {},
      }),
    );
    expect(err.message).toBe(
      "Invalid model snapshot at places.b.offset: offset 0 is not unique within 0..1",
    );
  });

  it("rejects a negative capacity", () => {
    const err = errorOf(() =>
      MetaModel.fromSnapshot({
        schema: "s",
        places: { a: { initial: 0, capacity: -1, offset: 0 } },
        transitions: {},
      }),
    );
    expect(err.kind).toBe("invalid-snapshot");
    expect(err.message).toMatch(/^Invalid model snapshot at places\.a\.capacity: /);
  });

  it("rejects a guard on an unknown place", () => {
    const err = errorOf(() =>
      MetaModel.fromSnapshot({
        schema: "s",
        places: {},
        transitions: { t: { delta: [], role: "r", guards: { ghost: 1 } } },
      }),
    );
    expect(err.message).toBe(
      'Invalid model snapshot at transitions.t.guards.ghost: guard references unknown place "ghost"',
    );
  });

  it("rejects a __proto__ place key", () => {
    const err = errorOf(() =>
      MetaModel.fromBytes(
        bytesOf(
          '{"schema":"s","places":{"__proto__":{"initial":0,"capacity":0,"offset":0}},' +
            '"transitions":{"t":{"delta":[0],"role":"r"}}}',
        ),
      ),
    );
    expect(err.kind).toBe("invalid-snapshot");
    expect(err.message).toBe(
      "Invalid model snapshot at transitions.t.delta: delta has length 1, expected 0",
    );
  });

  it("rejects a guard naming an Object.prototype member", () => {
    const err = errorOf(() =>
      MetaModel.fromSnapshot({
        schema: "s",
        places: {},
        transitions: { t: { delta: [], role: "r", guards: { toString: 1 } } },
      }),
    );
    expect(err.message).toBe(
      'Invalid model snapshot at transitions.t.guards.toString: guard references unknown place "toString"',
    );
  });
});

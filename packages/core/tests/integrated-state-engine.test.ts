import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  IntegratedStateEngine,
  InvalidIdentifierKindError,
  InvalidStateKindError,
  MemoryStateStore,
  NoDefaultRegisteredError,
  NoHandlerForStateError,
  type MachineId,
  type State,
  type StateStore,
} from "../src/index.js";

describe("IntegratedStateEngine", () => {
  let store: MemoryStateStore;
  let engine: IntegratedStateEngine<[string]>;

  beforeEach(() => {
    store = new MemoryStateStore();
    engine = new IntegratedStateEngine<[string]>({ store });
    engine.register("asleep")((input) => (input === "wake" ? "awake" : "asleep"));
    engine.register("awake", true)((input) => (input === "sleep" ? "asleep" : "awake"));
  });

  it("starts unknown machines at the default handler", async () => {
    await engine.execute("m1", "sleep");

    expect(await store.get("m1")).toBe("asleep");
  });

  it("resumes from the stored state", async () => {
    await engine.execute("m1", "sleep");
    await engine.execute("m1", "nothing");

    expect(await engine.stateOf("m1")).toBe("asleep");

    await engine.execute("m1", "wake");

    expect(await engine.stateOf("m1")).toBeUndefined();
  });

  it("removes machines that return to the default state", async () => {
    await engine.execute("m1", "sleep");
    expect(store.size).toBe(1);

    await engine.execute("m1", "wake");

    expect(await store.has("m1")).toBe(false);
    expect(store.size).toBe(0);
  });

  it("never stores the default state", async () => {
    await engine.execute("m1", "nothing");

    expect(store.size).toBe(0);
  });

  it("removes machines whose handler returns nothing", async () => {
    const local = new IntegratedStateEngine<[]>({ store });
    local.register("idle", true)(() => "running");
    local.register("running")(() => undefined);

    await local.execute(7);
    expect(await store.get(7)).toBe("running");

    await local.execute(7);
    expect(await store.has(7)).toBe(false);
  });

  it("tracks machines independently", async () => {
    await engine.execute("a", "sleep");
    await engine.execute(1, "nothing");
    await engine.execute(2.5, "sleep");

    expect(await engine.stateOf("a")).toBe("asleep");
    expect(await engine.stateOf(1)).toBeUndefined();
    expect(await engine.stateOf(2.5)).toBe("asleep");
    expect(await engine.stateOf("1")).toBeUndefined();
  });

  it("rejects invalid ids before touching the store", async () => {
    const get = vi.spyOn(store, "get");

    await expect(Reflect.apply(engine.execute, engine, [true, "sleep"])).rejects.toThrow(
      InvalidIdentifierKindError,
    );
    await expect(Reflect.apply(engine.execute, engine, [undefined, "sleep"])).rejects.toThrow(
      "Invalid machine id undefined: an id can only be a string or a finite number",
    );
    expect(get).not.toHaveBeenCalled();
  });

  it("validates ids in stateOf and reset", async () => {
    await expect(Reflect.apply(engine.stateOf, engine, [false])).rejects.toThrow(
      InvalidIdentifierKindError,
    );
    await expect(Reflect.apply(engine.reset, engine, [{}])).rejects.toThrow(
      InvalidIdentifierKindError,
    );
  });

  it("resets a machine to its entry point", async () => {
    await engine.execute("m1", "sleep");

    await engine.reset("m1");

    expect(await engine.stateOf("m1")).toBeUndefined();
    await engine.execute("m1", "nothing");
    expect(store.size).toBe(0);
  });

  it("leaves the store untouched when dispatching fails", async () => {
    const broken = new IntegratedStateEngine<[string]>({ store });
    broken.register("idle", true)(() => "missing");

    await broken.execute("m1", "go");
    expect(await store.get("m1")).toBe("missing");

    await expect(broken.execute("m1", "go")).rejects.toThrow(NoHandlerForStateError);
    expect(await store.get("m1")).toBe("missing");
  });

  it("leaves the store untouched when the handler throws", async () => {
    const failing = new IntegratedStateEngine<[]>({ store });
    failing.register("idle", true)(() => "step");
    failing.register("step")(() => {
      throw new Error("step failed");
    });

    await failing.execute("m1");
    await expect(failing.execute("m1")).rejects.toThrow("step failed");

    expect(await store.get("m1")).toBe("step");
  });

  it("checks the returned state when writing it back", async () => {
    const overflow = vi.fn(() => Number.POSITIVE_INFINITY);
    const local = new IntegratedStateEngine<[]>({ store });
    local.register("idle", true)(() => "step");
    local.register("step")(overflow);

    await local.execute("m1");
    await expect(local.execute("m1")).rejects.toThrow(InvalidStateKindError);

    expect(overflow).toHaveBeenCalledTimes(1);
    expect(await store.get("m1")).toBe("step");
  });

  it("requires a default handler", async () => {
    const empty = new IntegratedStateEngine();

    await expect(empty.execute("m1")).rejects.toThrow(NoDefaultRegisteredError);
  });

  it("exposes the handler context", async () => {
    const seen: State[] = [];
    const local = new IntegratedStateEngine<[]>();
    local.register("idle", true)(() => {
      seen.push(local.currentState);
      return "busy";
    });
    local.register("busy")(() => {
      seen.push(local.currentState);
      return "idle";
    });

    await local.execute("m");
    await local.execute("m");

    expect(seen).toEqual(["idle", "busy"]);
    expect(local.defaultState).toBe("idle");
    expect(local.states()).toEqual(["idle", "busy"]);
    expect(local.hasHandler("busy")).toBe(true);
  });

  it("uses a memory store by default", async () => {
    const local = new IntegratedStateEngine<[]>();
    local.register("idle", true)(() => "busy");
    local.register("busy")(() => "busy");

    await local.execute("m");

    expect(local.store).toBeInstanceOf(MemoryStateStore);
    expect(await local.stateOf("m")).toBe("busy");
  });

  it("works with any StateStore implementation", async () => {
    const data = new Map<MachineId, State>();
    const custom: StateStore = {
      get: vi.fn(async (id: MachineId) => data.get(id)),
      set: vi.fn(async (id: MachineId, state: State) => {
        data.set(id, state);
      }),
      delete: vi.fn(async (id: MachineId) => {
        data.delete(id);
      }),
      close: vi.fn(async () => {}),
    };
    const local = new IntegratedStateEngine<[string]>({ store: custom });
    local.register("awake", true)((input) => (input === "sleep" ? "asleep" : "awake"));
    local.register("asleep")((input) => (input === "wake" ? "awake" : "asleep"));

    await local.execute("m", "sleep");
    await local.execute("m", "wake");
    await local.close();

    expect(custom.set).toHaveBeenCalledWith("m", "asleep");
    expect(custom.delete).toHaveBeenCalledWith("m");
    expect(custom.close).toHaveBeenCalledTimes(1);
    expect(data.size).toBe(0);
  });

  it("logs when a machine returns to rest", async () => {
    const debug = vi.fn();
    const local = new IntegratedStateEngine<[]>({ logger: { debug } });
    local.register("idle", true)(() => "idle");

    await local.execute("m");

    expect(debug).toHaveBeenCalledWith('Machine "m" is back at rest');
  });
});

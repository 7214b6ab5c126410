import { IdempotencyStore, KeyedQueue, UnifiedPersistence } from "../index";

describe("UnifiedPersistence (memory mode)", () => {
  it("round-trips namespaced state and forgets deleted keys", async () => {
    const store = new UnifiedPersistence({ namespace: "test" });

    await store.setState("cart:cus_1", { lines: 2 });
    expect(await store.getState<{ lines: number }>("cart:cus_1")).toEqual({ lines: 2 });

    await store.deleteState("cart:cus_1");
    expect(await store.getState("cart:cus_1")).toBeNull();
  });

  it("keeps namespaces apart", async () => {
    const a = new UnifiedPersistence({ namespace: "a" });
    const b = new UnifiedPersistence({ namespace: "b" });

    await a.setCache("menu", "from-a", 60);
    expect(await b.getCache("menu")).toBeNull();
    expect(await a.getCache("menu")).toBe("from-a");
  });

  it("expires cache entries after their ttl", async () => {
    const store = new UnifiedPersistence({ namespace: "ttl" });
    const nowSpy = jest.spyOn(Date, "now").mockReturnValue(1_000_000);

    await store.setCache("quote", "500", 300);
    nowSpy.mockReturnValue(1_000_000 + 299_000);
    expect(await store.getCache("quote")).toBe("500");

    nowSpy.mockReturnValue(1_000_000 + 300_000);
    expect(await store.getCache("quote")).toBeNull();

    nowSpy.mockRestore();
  });
});

describe("IdempotencyStore", () => {
  it("replays the first response for the same key", async () => {
    const store = new IdempotencyStore({ namespace: "test", ttlSeconds: 60 });
    let calls = 0;
    const handler = async (): Promise<{ orderId: string }> => {
      calls += 1;
      return { orderId: `ord_${calls}` };
    };

    const first = await store.execute("checkout:cus_1:abc", handler);
    const second = await store.execute("  CHECKOUT:cus_1:ABC ", handler);

    expect(first).toEqual({ orderId: "ord_1" });
    expect(second).toEqual({ orderId: "ord_1" });
    expect(calls).toBe(1);
  });

  it("shares one in-flight run between concurrent callers", async () => {
    const store = new IdempotencyStore({ namespace: "test-concurrent" });
    let calls = 0;
    const handler = async (): Promise<number> => {
      calls += 1;
      return calls;
    };

    const [a, b] = await Promise.all([
      store.execute("k", handler),
      store.execute("k", handler),
    ]);

    expect(a).toBe(1);
    expect(b).toBe(1);
    expect(calls).toBe(1);
  });

  it("does not store a failed run", async () => {
    const store = new IdempotencyStore({ namespace: "test-failure" });

    await expect(store.execute("k", async () => {
      throw new Error("card declined");
    })).rejects.toThrow("card declined");

    expect(await store.get("k")).toBeNull();
    await expect(store.execute("k", async () => "ok")).resolves.toBe("ok");
  });
});

describe("UnifiedPersistence.remember", () => {
  it("loads once and serves the cached copy until it expires", async () => {
    const store = new UnifiedPersistence({ namespace: "remember" });
    const nowSpy = jest.spyOn(Date, "now").mockReturnValue(5_000);
    let loads = 0;
    const load = async (): Promise<{ feeCents: number }> => {
      loads += 1;
      return { feeCents: 500 * loads };
    };

    expect(await store.remember("quote", 10, load)).toEqual({ feeCents: 500 });
    expect(await store.remember("quote", 10, load)).toEqual({ feeCents: 500 });

    nowSpy.mockReturnValue(15_000);
    expect(await store.remember("quote", 10, load)).toEqual({ feeCents: 1000 });
    expect(loads).toBe(2);

    nowSpy.mockRestore();
  });

  it("reloads after the cache entry is deleted", async () => {
    const store = new UnifiedPersistence({ namespace: "remember-delete" });
    let loads = 0;
    const load = (): number => {
      loads += 1;
      return loads;
    };

    await store.remember("count", 60, load);
    await store.deleteCache("count");

    expect(await store.remember("count", 60, load)).toBe(2);
  });
});

describe("KeyedQueue", () => {
  it("runs tasks under one key one after another", async () => {
    const queue = new KeyedQueue();
    const steps: string[] = [];
    const task = (name: string) => async () => {
      steps.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      steps.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run("cus_1", task("a")), queue.run("cus_1", task("b"))]);

    expect(results).toEqual(["a", "b"]);
    expect(steps).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a failed task and leaves other keys alone", async () => {
    const queue = new KeyedQueue();
    const failing = queue.run("cus_1", async () => {
      throw new Error("boom");
    });
    const next = queue.run("cus_1", () => "after");
    const other = queue.run("cus_2", () => "other");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
    await expect(other).resolves.toBe("other");
  });
});

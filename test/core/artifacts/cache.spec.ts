// test/core/artifacts/cache.spec.ts
// Tests for the LRU artifact cache and its coalescing

import { describe, it, expect } from "vitest";
import { InMemoryArtifactCache } from "../../../src/core/artifacts/cache";
import { sha256Of } from "../../../src/core/artifacts/hash";
import { makeArtifact, sleep } from "../../helpers/fixtures";

const h = (s: string) => sha256Of(s);

describe("InMemoryArtifactCache", () => {
  it("counts misses and hits", () => {
    const cache = new InMemoryArtifactCache();
    const artifact = makeArtifact({ inputHash: h("a") });

    expect(cache.get(h("a"))).toBeUndefined();
    cache.set(h("a"), artifact);
    expect(cache.get(h("a"))).toBe(artifact);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, coalesced: 0, size: 1 });
  });

  it("never replaces an existing entry through set", () => {
    const cache = new InMemoryArtifactCache();
    const first = makeArtifact({ code: "first" });
    cache.set(h("a"), first);
    cache.set(h("a"), makeArtifact({ code: "second" }));
    expect(cache.get(h("a"))?.code).toBe("first");
  });

  it("evicts the least recently used entry at the bound", () => {
    const cache = new InMemoryArtifactCache(2);
    cache.set(h("a"), makeArtifact({ code: "a" }));
    cache.set(h("b"), makeArtifact({ code: "b" }));
    cache.get(h("a"));
    cache.set(h("c"), makeArtifact({ code: "c" }));

    expect(cache.size()).toBe(2);
    expect(cache.get(h("b"))).toBeUndefined();
    expect(cache.get(h("a"))?.code).toBe("a");
    expect(cache.get(h("c"))?.code).toBe("c");
    expect(cache.stats().evictions).toBe(1);
  });

  it("drops an entry on evict", () => {
    const cache = new InMemoryArtifactCache();
    cache.set(h("a"), makeArtifact());
    expect(cache.evict(h("a"))).toBe(true);
    expect(cache.evict(h("a"))).toBe(false);
    expect(cache.size()).toBe(0);
  });

  it("coalesces concurrent computations of one hash", async () => {
    const cache = new InMemoryArtifactCache();
    let runs = 0;
    const compute = async () => {
      runs++;
      await sleep(5);
      return makeArtifact();
    };

    const [one, two] = await Promise.all([cache.coalesce(h("a"), compute), cache.coalesce(h("a"), compute)]);
    expect(runs).toBe(1);
    expect(one.shared).toBe(false);
    expect(two.shared).toBe(true);
    expect(two.artifact).toBe(one.artifact);
    expect(cache.stats().coalesced).toBe(1);
  });
});

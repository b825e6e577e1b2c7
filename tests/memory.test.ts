import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { HashingEmbedder, MemoryStore, cosineSimilarity, formatReflections, tokenize, type Embedder } from "../src/memory.js";
import { ConfigurationError } from "../src/errors.js";
import { fixedClock } from "./helpers.js";

function store(embedder?: Embedder) {
  let id = 0;
  return new MemoryStore({ embedder, now: fixedClock, newId: () => `mem-${++id}` });
}

/** One dimension per known word, so similarities are easy to reason about */
class KeywordEmbedder implements Embedder {
  readonly id = "keywords-v1";
  constructor(private readonly words: string[]) {}
  embed(text: string): number[] {
    const tokens = tokenize(text);
    return this.words.map((w) => (tokens.includes(w) ? 1 : 0));
  }
}

describe("HashingEmbedder", () => {
  it("is deterministic and L2-normalized", () => {
    const embedder = new HashingEmbedder();
    const a = embedder.embed("BTC rallied on ETF inflows");
    expect(a).toEqual(embedder.embed("btc RALLIED, on etf inflows!"));
    expect(a).toHaveLength(256);
    expect(Math.sqrt(a.reduce((s, v) => s + v * v, 0))).toBeCloseTo(1, 10);
    expect(embedder.id).toBe("hashing-bow-256");
  });

  it("maps empty text to the zero vector", () => {
    expect(new HashingEmbedder(8).embed("  ...  ")).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe("cosineSimilarity", () => {
  it("handles parallel, orthogonal and degenerate vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 0])).toBe(0);
  });
});

describe("MemoryStore", () => {
  it("returns nothing on cold start or for k <= 0", () => {
    const memory = store();
    expect(memory.retrieve("anything", 3)).toEqual([]);
    memory.add({ situation: "BTC", reflection: "r", outcome: "o" });
    expect(memory.retrieve("BTC", 0)).toEqual([]);
  });

  it("keeps stored embeddings read-only for callers", () => {
    const memory = store(new KeywordEmbedder(["btc", "eth"]));
    memory.add({ situation: "btc rally", reflection: "r", outcome: "profit" });
    const [hit] = memory.retrieve("btc rally", 1);

    expect(Object.isFrozen(hit.record.embedding)).toBe(true);
    expect(Reflect.set(hit.record.embedding, 0, 0)).toBe(false);
    expect(memory.retrieve("btc rally", 1)[0].similarity).toBe(1);
  });

  it("returns at most k records by descending similarity, ties in insertion order", () => {
    const memory = store(new KeywordEmbedder(["btc", "eth", "etf"]));
    memory.add({ situation: "eth upgrade", reflection: "first", outcome: "profit" });
    memory.add({ situation: "btc etf approval", reflection: "second", outcome: "profit" });
    memory.add({ situation: "btc halving", reflection: "third", outcome: "loss" });
    memory.add({ situation: "btc miners", reflection: "fourth", outcome: "flat" });

    const found = memory.retrieve("btc etf", 3);

    expect(found.map((m) => m.record.reflection)).toEqual(["second", "third", "fourth"]);
    expect(found[0].similarity).toBeCloseTo(1, 10);
    expect(found[1].similarity).toBeCloseTo(Math.SQRT1_2, 10);
    expect(found[1].similarity).toBe(found[2].similarity);
  });

  it("does not change on retrieval, and earlier snapshots survive later adds", () => {
    const memory = store();
    memory.add({ situation: "BTC breakout", reflection: "r1", outcome: "profit" });
    const before = memory.all();
    memory.retrieve("BTC breakout", 5);
    memory.add({ situation: "ETH slump", reflection: "r2", outcome: "loss" });

    expect(before).toHaveLength(1);
    expect(memory.size).toBe(2);
    expect(Object.isFrozen(memory.all()[1])).toBe(true);
  });

  it("records id, clock time and source", () => {
    const record = store().add({ situation: "s", reflection: "r", outcome: "profit", source: "trader" });
    expect(record).toMatchObject({
      id: "mem-1",
      situation: "s",
      reflection: "r",
      outcome: "profit",
      source: "trader",
      created_at: "2024-05-01T12:00:00.000Z",
    });
  });

  describe("persistence", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "tradegraph-memory-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("round-trips through a JSON file", async () => {
      const file = join(dir, "memory.json");
      const memory = store();
      memory.add({ situation: "BTC breakout", reflection: "Buying worked.", outcome: "profit" });
      await memory.save(file);

      const loaded = await MemoryStore.load(file);
      expect(loaded.all()).toEqual(memory.all());
      expect(loaded.all().every((r) => Object.isFrozen(r.embedding))).toBe(true);
      expect(JSON.parse(await readFile(file, "utf-8")).embedding_model).toBe("hashing-bow-256");
    });

    it("starts empty when the file does not exist", async () => {
      expect((await MemoryStore.load(join(dir, "missing.json"))).size).toBe(0);
    });

    it("re-embeds records written by another embedder", async () => {
      const file = join(dir, "memory.json");
      await writeFile(
        file,
        JSON.stringify({
          embedding_model: "other-model",
          records: [
            { id: "a", situation: "btc etf", embedding: [0.5], reflection: "r", outcome: "o", created_at: "t" },
          ],
        }),
      );
      const loaded = await MemoryStore.load(file, { embedder: new KeywordEmbedder(["btc", "etf"]) });
      expect(loaded.all()[0].embedding).toEqual([1, 1]);
      expect(Object.isFrozen(loaded.all()[0].embedding)).toBe(true);
    });

    it("rejects a file with the wrong shape", async () => {
      const file = join(dir, "memory.json");
      await writeFile(file, JSON.stringify({ records: "nope" }));
      await expect(MemoryStore.load(file)).rejects.toThrow(ConfigurationError);
    });
  });
});

describe("formatReflections", () => {
  it("numbers reflections with their outcome", () => {
    const memory = store();
    memory.add({ situation: "s", reflection: "Take profits sooner.", outcome: "loss (-4.00%)" });
    expect(formatReflections(memory.retrieve("s", 1))).toBe("1. (outcome: loss (-4.00%)) Take profits sooner.");
    expect(formatReflections([])).toBe("No past reflections available.");
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  assessVerdict,
  buildReflectionPrompt,
  outcomeLabel,
  reflectAndRemember,
  templatedReflection,
} from "../src/reflection.js";
import { createInitialState } from "../src/graph.js";
import { resolveConfig } from "../src/config.js";
import { PIPELINE_VARIANTS } from "../src/variants.js";
import { MemoryStore } from "../src/memory.js";
import type { MemoryCandidate, TradingState } from "../src/types.js";
import { ScriptedGenerator, fixedClock } from "./helpers.js";

const traderCandidate: MemoryCandidate = {
  source: "trader",
  situation: "BTC on 2024-05-01\n\nPrice broke out.",
  rationale: "Follow the plan.",
  verdict: "BUY",
};

function stateWithCandidates(): TradingState {
  const state = createInitialState("BTC", "2024-05-01", PIPELINE_VARIANTS.crypto, resolveConfig({}));
  state.memory_candidates.push(
    { ...traderCandidate, source: "research_manager", rationale: "Momentum is strong." },
    traderCandidate,
  );
  return state;
}

describe("outcomeLabel", () => {
  it("appends signed returns when known", () => {
    expect(outcomeLabel({ label: "profit", returns_pct: 4.2 })).toBe("profit (+4.20%)");
    expect(outcomeLabel({ label: "loss", returns_pct: -3 })).toBe("loss (-3.00%)");
    expect(outcomeLabel({ label: "flat" })).toBe("flat");
  });
});

describe("assessVerdict", () => {
  it("judges each verdict against realized returns", () => {
    expect(assessVerdict("BUY", 5)).toBe("correct");
    expect(assessVerdict("BUY", -1)).toBe("incorrect");
    expect(assessVerdict("SELL", -1)).toBe("correct");
    expect(assessVerdict("HOLD", 1.5)).toBe("correct");
    expect(assessVerdict("HOLD", -6)).toBe("incorrect");
    expect(assessVerdict("SELL", undefined)).toBe("unknown");
  });
});

describe("templatedReflection", () => {
  it("states the verdict, the judgement and the reasoning at the time", () => {
    expect(templatedReflection(traderCandidate, { label: "loss", returns_pct: -3 })).toBe(
      "The Trader recommended BUY, which proved incorrect given the outcome loss (-3.00%). " +
        "Reasoning at the time: Follow the plan.",
    );
    expect(templatedReflection(traderCandidate, { label: "flat" })).toBe(
      "The Trader recommended BUY, with an outcome of flat. Reasoning at the time: Follow the plan.",
    );
  });

  it("shortens long reasoning", () => {
    const text = templatedReflection({ ...traderCandidate, rationale: "x".repeat(400) }, { label: "flat" });
    expect(text.endsWith(`${"x".repeat(297)}...`)).toBe(true);
  });
});

describe("buildReflectionPrompt", () => {
  it("includes the situation, decision and outcome", () => {
    const prompt = buildReflectionPrompt(traderCandidate, { label: "profit", returns_pct: 2 });
    expect(prompt).toContain("## Market Situation At The Time\nBTC on 2024-05-01\n\nPrice broke out.");
    expect(prompt).toContain("## Decision by the Trader\nVerdict: BUY\nRationale: Follow the plan.");
    expect(prompt).toContain("## Outcome\nprofit (+2.00%)");
  });
});

describe("reflectAndRemember", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tradegraph-reflect-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores one reflection per candidate and saves the store", async () => {
    const generator = new ScriptedGenerator((_prompt, { agent }) => {
      if (agent === "Trader reflection") throw new Error("overloaded");
      return "  The breakout call was right.  ";
    });
    const memory = new MemoryStore({ now: fixedClock });
    const memoryFile = join(dir, "memory.json");

    const records = await reflectAndRemember(stateWithCandidates(), { label: "profit", returns_pct: 6 }, {
      generator,
      memory,
      generationTimeoutMs: 1_000,
      memoryFile,
    });

    expect(records.map((r) => [r.source, r.reflection, r.outcome])).toEqual([
      ["research_manager", "The breakout call was right.", "profit (+6.00%)"],
      [
        "trader",
        "The Trader recommended BUY, which proved correct given the outcome profit (+6.00%). Reasoning at the time: Follow the plan.",
        "profit (+6.00%)",
      ],
    ]);
    expect(generator.calls.map((c) => [c.agent, c.tier])).toEqual([
      ["Research Manager reflection", "deep"],
      ["Trader reflection", "deep"],
    ]);
    expect(memory.size).toBe(2);

    const reloaded = await MemoryStore.load(memoryFile);
    expect(reloaded.all().map((r) => r.reflection)).toEqual(records.map((r) => r.reflection));
    expect(reloaded.retrieve("BTC on 2024-05-01 Price broke out.", 1)[0].record.situation).toBe(
      traderCandidate.situation,
    );
  });

  it("does nothing for a run without candidates", async () => {
    const state = createInitialState("ETH", "2024-05-01", PIPELINE_VARIANTS.crypto, resolveConfig({}));
    const memory = new MemoryStore();
    const records = await reflectAndRemember(state, { label: "flat" }, {
      generator: new ScriptedGenerator(() => "unused"),
      memory,
      generationTimeoutMs: 1_000,
    });
    expect(records).toEqual([]);
    expect(memory.size).toBe(0);
  });
});

import { describe, it, expect } from "vitest";
import {
  DebateController,
  RESEARCH_PARTICIPANTS,
  RISK_PARTICIPANTS,
  createTranscript,
  formatAnalystReportsForPrompt,
  formatTranscript,
  situationSummary,
  type DebateContext,
} from "../src/debate.js";
import { MemoryStore, type MemoryRetriever } from "../src/memory.js";
import type { AnalystReport } from "../src/types.js";
import { ScriptedGenerator, fixedClock, type Responder } from "./helpers.js";

const marketReport: AnalystReport = {
  analyst: "market",
  analyst_name: "Market Analyst",
  status: "done",
  report: "Price is range-bound.",
  degraded: false,
  data_available: true,
  tools_attempted: 1,
  tools_failed: 0,
  started_at: "2024-05-01T12:00:00.000Z",
  ended_at: "2024-05-01T12:00:00.000Z",
};

const context: DebateContext = {
  asset: "BTC",
  date: "2024-05-01",
  reports: { market: marketReport },
  situation: situationSummary("BTC", "2024-05-01", { market: marketReport }),
};

function controller(
  respond: Responder,
  memory: MemoryRetriever = new MemoryStore(),
  memoryTopK = 2,
  generationTimeoutMs = 1_000,
) {
  const generator = new ScriptedGenerator(respond);
  const debates = new DebateController({ generator, memory, memoryTopK, generationTimeoutMs, now: fixedClock });
  return { debates, generator };
}

describe("situationSummary", () => {
  it("joins the asset line and reports in analyst order", () => {
    const news: AnalystReport = { ...marketReport, analyst: "news", analyst_name: "News Analyst", report: "Quiet news." };
    expect(situationSummary("ETH", "2024-05-01", { news, market: marketReport })).toBe(
      "ETH on 2024-05-01\n\nPrice is range-bound.\n\nQuiet news.",
    );
  });
});

describe("formatAnalystReportsForPrompt", () => {
  it("flags degraded and data-less reports", () => {
    const onchain: AnalystReport = {
      ...marketReport,
      analyst: "onchain",
      analyst_name: "On-Chain Analyst",
      degraded: true,
      data_available: false,
      report: "Guesswork.",
    };
    expect(formatAnalystReportsForPrompt({ onchain })).toBe(
      "## Analyst Team Reports\n\n### On-Chain Analyst (degraded, no live data)\nGuesswork.\n",
    );
    expect(formatAnalystReportsForPrompt({})).toBe("## Analyst Team Reports\n\nNo analyst reports were produced.");
  });
});

describe("DebateController", () => {
  it("runs every role once per round, in order, for exactly max_rounds", async () => {
    const { debates, generator } = controller((_p, { agent }) => `${agent} speaks`);
    const transcript = createTranscript("research", ["bull", "bear"], 2);

    await debates.run(transcript, RESEARCH_PARTICIPANTS, context);

    expect(transcript.status).toBe("complete");
    expect(transcript.rounds_completed).toBe(2);
    expect(transcript.turns).toEqual([
      { role: "bull", round: 1, text: "Bull Researcher speaks", timestamp: "2024-05-01T12:00:00.000Z", degraded: false, reflections_used: 0 },
      { role: "bear", round: 1, text: "Bear Researcher speaks", timestamp: "2024-05-01T12:00:00.000Z", degraded: false, reflections_used: 0 },
      { role: "bull", round: 2, text: "Bull Researcher speaks", timestamp: "2024-05-01T12:00:00.000Z", degraded: false, reflections_used: 0 },
      { role: "bear", round: 2, text: "Bear Researcher speaks", timestamp: "2024-05-01T12:00:00.000Z", degraded: false, reflections_used: 0 },
    ]);
    expect(generator.calls.every((c) => c.tier === "quick")).toBe(true);
  });

  it("gives each turn the transcript so far and an empty reflection block on cold start", async () => {
    const { debates, generator } = controller((_p, { agent }) => `${agent} speaks`);
    await debates.run(createTranscript("research", ["bull", "bear"], 1), RESEARCH_PARTICIPANTS, context);

    const [bullPrompt, bearPrompt] = generator.calls.map((c) => c.prompt);
    expect(bullPrompt).toContain("No past reflections available.");
    expect(bullPrompt).toContain("None yet. You are presenting the opening bullish case.");
    expect(bearPrompt).toContain("Bull Researcher: Bull Researcher speaks");
    expect(bearPrompt).toContain("Price is range-bound.");
  });

  it("puts up to memory_top_k retrieved reflections into each prompt", async () => {
    let id = 0;
    const memory = new MemoryStore({ now: fixedClock, newId: () => `m${++id}` });
    memory.add({ situation: "BTC range-bound price", reflection: "Waiting paid off.", outcome: "flat" });
    memory.add({ situation: "ETH gas spike", reflection: "Fees hurt.", outcome: "loss" });
    memory.add({ situation: "SOL outage", reflection: "Exit early.", outcome: "loss" });

    const { debates, generator } = controller(() => "argument", memory, 2);
    const transcript = createTranscript("research", ["bull", "bear"], 1);
    await debates.run(transcript, RESEARCH_PARTICIPANTS, context);

    expect(transcript.turns.map((t) => t.reflections_used)).toEqual([2, 2]);
    expect(generator.calls[0].prompt).toContain("1. (outcome: flat) Waiting paid off.");
    expect(generator.calls[0].prompt).not.toContain("No past reflections available.");
  });

  it("continues without reflections when retrieval fails", async () => {
    const broken: MemoryRetriever = {
      retrieve: () => {
        throw new Error("index corrupted");
      },
    };
    const { debates } = controller(() => "argument", broken);
    const transcript = createTranscript("research", ["bull", "bear"], 1);
    await debates.run(transcript, RESEARCH_PARTICIPANTS, context);

    expect(transcript.status).toBe("complete");
    expect(transcript.turns.map((t) => t.reflections_used)).toEqual([0, 0]);
  });

  it("records a degraded placeholder turn when generation fails", async () => {
    const { debates } = controller((_p, { agent }) => {
      if (agent === "Bear Researcher") throw new Error("overloaded");
      return "Bull case.";
    });
    const transcript = createTranscript("research", ["bull", "bear"], 1);
    await debates.run(transcript, RESEARCH_PARTICIPANTS, context);

    expect(transcript.status).toBe("complete");
    expect(transcript.turns[1]).toMatchObject({
      role: "bear",
      text: "[no argument produced] Bear Researcher: overloaded",
      degraded: true,
    });
  });

  it("records a timed-out turn as degraded and carries on with the debate", async () => {
    const { debates, generator } = controller(
      (_p, { agent }) => (agent === "Bear Researcher" ? new Promise<string>(() => {}) : "Bull case."),
      new MemoryStore(),
      2,
      20,
    );
    const transcript = createTranscript("research", ["bull", "bear"], 2);
    await debates.run(transcript, RESEARCH_PARTICIPANTS, context);

    expect(transcript.status).toBe("complete");
    expect(transcript.rounds_completed).toBe(2);
    expect(transcript.turns.map((t) => `${t.role}${t.round}`)).toEqual(["bull1", "bear1", "bull2", "bear2"]);
    expect(transcript.turns[1]).toMatchObject({
      role: "bear",
      text: "[no argument produced] Bear Researcher: Bear Researcher generation timed out after 20ms",
      degraded: true,
    });
    expect(transcript.turns[2]).toMatchObject({ role: "bull", text: "Bull case.", degraded: false });
    expect(generator.agents()).toHaveLength(4);
  });

  it("stops before the next turn once cancelled and keeps the partial transcript", async () => {
    const abort = new AbortController();
    const { debates, generator } = controller(() => {
      abort.abort();
      return "Opening argument.";
    });
    const transcript = createTranscript("research", ["bull", "bear"], 3);
    await debates.run(transcript, RESEARCH_PARTICIPANTS, context, abort.signal);

    expect(transcript.status).toBe("cancelled");
    expect(transcript.turns.map((t) => t.role)).toEqual(["bull"]);
    expect(transcript.rounds_completed).toBe(0);
    expect(generator.calls).toHaveLength(1);
  });

  it("does nothing when already cancelled", async () => {
    const abort = new AbortController();
    abort.abort();
    const { debates, generator } = controller(() => "unused");
    const transcript = createTranscript("risk", ["risky", "safe", "neutral"], 1);
    await debates.run(transcript, RISK_PARTICIPANTS, context, abort.signal);

    expect(transcript.status).toBe("cancelled");
    expect(transcript.turns).toEqual([]);
    expect(generator.calls).toHaveLength(0);
  });

  it("refuses roles without a participant", async () => {
    const { debates } = controller(() => "unused");
    const transcript = createTranscript("risk", ["risky", "safe", "neutral"], 1);
    await expect(debates.run(transcript, RESEARCH_PARTICIPANTS, context)).rejects.toThrow(
      "No debate participant for role 'risky'",
    );
  });

  it("shows risk debaters the trader's proposal", async () => {
    const { debates, generator } = controller((_p, { agent }) => `${agent} view`);
    const transcript = createTranscript("risk", ["risky", "safe", "neutral"], 1);
    await debates.run(transcript, RISK_PARTICIPANTS, {
      ...context,
      traderDecision: {
        verdict: "BUY",
        rationale: "Momentum.",
        confidence: 0.8,
        degraded: false,
        raw_output: "",
        position_size_pct: 10,
      },
      investmentPlan: "Accumulate.",
    });

    expect(transcript.turns.map((t) => t.role)).toEqual(["risky", "safe", "neutral"]);
    const neutralPrompt = generator.calls[2].prompt;
    expect(neutralPrompt).toContain("Action: BUY\nConfidence: 80%\nPosition Size: 10%\nRationale: Momentum.");
    expect(neutralPrompt).toContain("Risky Analyst: Risky Analyst view");
    expect(neutralPrompt).toContain("Safe Analyst: Safe Analyst view");
    expect(neutralPrompt).toContain("## Research Manager's Plan\nAccumulate.");
  });
});

describe("formatTranscript", () => {
  it("groups turns by round", () => {
    const transcript = createTranscript("research", ["bull", "bear"], 1);
    expect(formatTranscript(transcript)).toBe("(no arguments yet)");

    transcript.turns.push(
      { role: "bull", round: 1, text: "Up.", timestamp: "t", degraded: false, reflections_used: 0 },
      { role: "bear", round: 1, text: "Down.", timestamp: "t", degraded: false, reflections_used: 0 },
    );
    expect(formatTranscript(transcript)).toBe(
      "### Round 1\n\n**Bull Researcher:**\nUp.\n\n**Bear Researcher:**\nDown.",
    );
  });
});

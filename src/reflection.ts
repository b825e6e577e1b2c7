import { generateWithin, type Generator } from "./generation.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { MemoryStore } from "./memory.js";
import type { MemoryCandidate, MemoryRecord, MemorySource, RunOutcome, TradingState, Verdict } from "./types.js";

// Moves smaller than this count as flat for judging a HOLD
const HOLD_BAND_PCT = 2;

const SOURCE_NAMES: Record<MemorySource, string> = {
  research_manager: "Research Manager",
  trader: "Trader",
  risk_manager: "Risk Manager",
};

export function outcomeLabel(outcome: RunOutcome): string {
  if (outcome.returns_pct === undefined) return outcome.label;
  const sign = outcome.returns_pct >= 0 ? "+" : "";
  return `${outcome.label} (${sign}${outcome.returns_pct.toFixed(2)}%)`;
}

/** Whether a verdict was right given realized returns, when they are known */
export function assessVerdict(verdict: Verdict, returnsPct: number | undefined): "correct" | "incorrect" | "unknown" {
  if (returnsPct === undefined) return "unknown";
  switch (verdict) {
    case "BUY":
      return returnsPct > 0 ? "correct" : "incorrect";
    case "SELL":
      return returnsPct < 0 ? "correct" : "incorrect";
    case "HOLD":
      return Math.abs(returnsPct) < HOLD_BAND_PCT ? "correct" : "incorrect";
  }
}

export function templatedReflection(candidate: MemoryCandidate, outcome: RunOutcome): string {
  const assessment = assessVerdict(candidate.verdict, outcome.returns_pct);
  const judged = assessment === "unknown" ? "with an outcome of" : `which proved ${assessment} given the outcome`;
  const rationale = candidate.rationale.length > 300 ? `${candidate.rationale.slice(0, 297)}...` : candidate.rationale;
  return `The ${SOURCE_NAMES[candidate.source]} recommended ${candidate.verdict}, ${judged} ${outcomeLabel(outcome)}. Reasoning at the time: ${rationale}`;
}

export function buildReflectionPrompt(candidate: MemoryCandidate, outcome: RunOutcome): string {
  return [
    `You are reviewing a past crypto trading decision now that its outcome is known.`,
    ``,
    `## Market Situation At The Time`,
    candidate.situation,
    ``,
    `## Decision by the ${SOURCE_NAMES[candidate.source]}`,
    `Verdict: ${candidate.verdict}`,
    `Rationale: ${candidate.rationale}`,
    ``,
    `## Outcome`,
    outcomeLabel(outcome),
    ``,
    `## Instructions`,
    `1. State whether the decision was correct given the outcome`,
    `2. Identify which factors (technical, on-chain, news, sentiment) were weighted well or badly`,
    `3. Give one concrete lesson for similar situations in the future`,
    `Answer in at most one short paragraph.`,
  ].join("\n");
}

export interface ReflectionOptions {
  generator: Generator;
  memory: MemoryStore;
  generationTimeoutMs: number;
  /** Saved after all reflections are added */
  memoryFile?: string;
  logger?: Logger;
}

/**
 * Turn each memory candidate of a finished run into a stored reflection.
 * A failed generation falls back to a templated reflection.
 */
export async function reflectAndRemember(
  state: TradingState,
  outcome: RunOutcome,
  options: ReflectionOptions,
): Promise<MemoryRecord[]> {
  const logger = options.logger ?? silentLogger;
  const records: MemoryRecord[] = [];

  for (const candidate of state.memory_candidates) {
    let reflection: string;
    try {
      reflection = await generateWithin(
        options.generator,
        buildReflectionPrompt(candidate, outcome),
        { agent: `${SOURCE_NAMES[candidate.source]} reflection`, tier: "deep" },
        options.generationTimeoutMs,
      );
    } catch (err: unknown) {
      logger.warn(`reflection for ${candidate.source} failed, using template: ${errorMessage(err)}`);
      reflection = templatedReflection(candidate, outcome);
    }
    records.push(
      options.memory.add({
        situation: candidate.situation,
        reflection,
        outcome: outcomeLabel(outcome),
        source: candidate.source,
      }),
    );
  }

  if (options.memoryFile) {
    await options.memory.save(options.memoryFile);
  }
  logger.info(`stored ${records.length} reflection(s) for ${state.asset} ${state.trade_date}`);
  return records;
}

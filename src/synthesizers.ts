import { generateWithin, type Generator, type ModelTier } from "./generation.js";
import { formatReflections, type MemoryRetriever } from "./memory.js";
import { silentLogger, type Logger } from "./logger.js";
import { errorMessage } from "./errors.js";
import {
  formatAnalystReportsForPrompt,
  formatTranscript,
  orderedReports,
  situationSummary,
} from "./debate.js";
import {
  verdictSchema,
  type Decision,
  type DebateTranscript,
  type FinalDecisionRecord,
  type MemorySource,
  type RiskOverridePolicy,
  type TraderDecision,
  type TradingState,
  type Verdict,
} from "./types.js";

// ── Output parsing ───────────────────────────────────────────

const VERDICT_PATTERNS = [
  /FINAL TRANSACTION PROPOSAL:\s*\**\s*(BUY|SELL|HOLD)\b/i,
  /FINAL_ACTION:\s*\**\s*(BUY|SELL|HOLD)\b/i,
  /RECOMMENDATION:\s*\**\s*(BUY|SELL|HOLD)\b/i,
];

export function parseVerdict(output: string): Verdict | null {
  for (const pattern of VERDICT_PATTERNS) {
    const match = output.match(pattern);
    if (!match) continue;
    const parsed = verdictSchema.safeParse(match[1].toUpperCase());
    if (parsed.success) return parsed.data;
  }
  return null;
}

/** CONFIDENCE as 0-1 or a percentage; clamped to [0, 1], default 0.5 */
export function parseConfidence(output: string): number {
  const match = output.match(/CONFIDENCE:\s*([\d.]+)\s*(%)?/i);
  if (!match) return 0.5;
  let value = parseFloat(match[1]);
  if (Number.isNaN(value)) return 0.5;
  if (match[2] || value > 1) value /= 100;
  return Math.min(1, Math.max(0, value));
}

export function parsePositionSize(output: string): number | undefined {
  const match = output.match(/POSITION_SIZE_PCT:\s*([\d.]+)/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  return Number.isNaN(value) ? undefined : Math.min(100, Math.max(0, value));
}

/** RATIONALE section up to the next labelled line, else the whole output */
export function parseRationale(output: string): string {
  const match = output.match(/RATIONALE:\s*([\s\S]*?)(?=\n[A-Z][A-Z_ ]+:|$)/);
  const rationale = match?.[1]?.trim();
  return rationale ? rationale : output.trim();
}

function parseDecision(output: string, fallback: Verdict): Decision {
  const verdict = parseVerdict(output);
  return {
    verdict: verdict ?? fallback,
    rationale: parseRationale(output),
    confidence: parseConfidence(output),
    degraded: verdict === null,
    raw_output: output,
  };
}

function requireComplete(transcript: DebateTranscript, reader: string): void {
  if (transcript.status !== "complete") {
    throw new Error(`${reader} cannot read a ${transcript.kind} debate with status '${transcript.status}'`);
  }
}

// ── Risk override policy ─────────────────────────────────────

export interface PolicyOutcome {
  verdict: Verdict;
  /** Set when the policy changed the verdict */
  reason?: string;
}

const RISK_FLAGS_PATTERN = /^\s*RISK_FLAGS:\s*(.*)$/gim;

function normalizeFlag(flag: string): string {
  return flag.toLowerCase().replace(/[_-]+/g, " ").replace(/\s+/g, " ").trim();
}

/**
 * Risks named on `RISK_FLAGS:` lines, normalized to lower case with spaces.
 * "none" and negated entries ("no liquidity risk") are dropped.
 */
export function parseRiskFlags(text: string): string[] {
  const flags: string[] = [];
  for (const match of text.matchAll(RISK_FLAGS_PATTERN)) {
    for (const entry of match[1].split(/[,;]/)) {
      const flag = normalizeFlag(entry);
      if (flag.length === 0 || flag === "none" || /^(no|not|without)\b/.test(flag)) continue;
      flags.push(flag);
    }
  }
  return flags;
}

function formatUsdVolume(value: number): string {
  return `$${(value / 1_000_000).toFixed(1)}M`;
}

/**
 * Deterministic guard applied after the risk manager's own verdict:
 * - no live data at all forces HOLD;
 * - live 24h volume under `min_liquidity_24h_usd`, or a downgrade keyword
 *   among the risk debaters' RISK_FLAGS, moves a verdict in
 *   `downgrade_from` to `downgrade_to`.
 */
export function applyRiskPolicy(proposed: Verdict, state: TradingState, policy: RiskOverridePolicy): PolicyOutcome {
  const reports = orderedReports(state.analyst_reports);
  if (policy.hold_on_insufficient_evidence && proposed !== "HOLD" && !reports.some((r) => r.data_available)) {
    return { verdict: "HOLD", reason: "insufficient evidence: no analyst report contained live data" };
  }

  if (!policy.downgrade_from.includes(proposed) || proposed === policy.downgrade_to) {
    return { verdict: proposed };
  }

  const volumes = reports.flatMap((r) => (r.volume_24h_usd !== undefined ? [r.volume_24h_usd] : []));
  if (policy.min_liquidity_24h_usd > 0 && volumes.length > 0) {
    const volume = Math.min(...volumes);
    if (volume < policy.min_liquidity_24h_usd) {
      return {
        verdict: policy.downgrade_to,
        reason: `24h volume ${formatUsdVolume(volume)} is below the ${formatUsdVolume(policy.min_liquidity_24h_usd)} liquidity floor`,
      };
    }
  }

  const flags = state.risk_debate.turns.flatMap((t) => parseRiskFlags(t.text));
  const keyword = policy.downgrade_keywords.find((k) => flags.some((f) => f.includes(normalizeFlag(k))));
  if (keyword) {
    return { verdict: policy.downgrade_to, reason: `the risk debate flagged "${keyword}"` };
  }

  return { verdict: proposed };
}

// ── Synthesizers ─────────────────────────────────────────────

export interface SynthesizerOptions {
  generator: Generator;
  memory: MemoryRetriever;
  memoryTopK: number;
  generationTimeoutMs: number;
  logger?: Logger;
}

abstract class Synthesizer {
  protected readonly logger: Logger;
  protected abstract readonly name: string;
  protected abstract readonly source: MemorySource;
  protected abstract readonly tier: ModelTier;

  constructor(protected readonly options: SynthesizerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  protected async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    return generateWithin(
      this.options.generator,
      prompt,
      { agent: this.name, tier: this.tier, signal },
      this.options.generationTimeoutMs,
    );
  }

  protected reflections(situation: string): string {
    try {
      return formatReflections(this.options.memory.retrieve(situation, this.options.memoryTopK));
    } catch (err: unknown) {
      this.logger.warn(`${this.name}: memory retrieval failed: ${errorMessage(err)}`);
      return formatReflections([]);
    }
  }

  protected remember(state: TradingState, situation: string, decision: Decision): void {
    state.memory_candidates.push({
      source: this.source,
      situation,
      rationale: decision.rationale,
      verdict: decision.verdict,
    });
  }
}

/** Judges the bull/bear debate and writes the investment plan */
export class ResearchManager extends Synthesizer {
  protected readonly name = "Research Manager";
  protected readonly source = "research_manager";
  protected readonly tier = "deep";

  async synthesize(state: TradingState, signal?: AbortSignal): Promise<Decision> {
    requireComplete(state.research_debate, this.name);
    const situation = situationSummary(state.asset, state.trade_date, state.analyst_reports);

    const prompt = [
      `You are the RESEARCH MANAGER and debate facilitator for ${state.asset} on ${state.trade_date}.`,
      ``,
      `Evaluate the bull/bear debate below and commit to a recommendation: BUY, SELL or HOLD.`,
      `Choose HOLD only when it is strongly justified by the arguments, not as a fallback.`,
      ``,
      formatAnalystReportsForPrompt(state.analyst_reports),
      ``,
      `## Debate Transcript`,
      formatTranscript(state.research_debate),
      ``,
      `## Lessons From Similar Past Situations`,
      this.reflections(situation),
      ``,
      `## Required Output Format (strict)`,
      `RECOMMENDATION: BUY | SELL | HOLD`,
      `CONFIDENCE: 0.0 to 1.0`,
      `RATIONALE: which arguments were most convincing and why`,
      `INVESTMENT_PLAN: concrete plan for the trader`,
    ].join("\n");

    const decision = parseDecision(await this.generate(prompt, signal), "HOLD");
    this.remember(state, situation, decision);
    this.logger.info(`${this.name}: ${decision.verdict} (${(decision.confidence * 100).toFixed(0)}%)`);
    return decision;
  }
}

/** Turns the investment plan into a concrete proposal */
export class Trader extends Synthesizer {
  protected readonly name = "Trader";
  protected readonly source = "trader";
  protected readonly tier = "quick";

  constructor(
    options: SynthesizerOptions,
    private readonly maxPositionSizePct = 100,
  ) {
    super(options);
  }

  async synthesize(state: TradingState, signal?: AbortSignal): Promise<TraderDecision> {
    requireComplete(state.research_debate, this.name);
    const situation = situationSummary(state.asset, state.trade_date, state.analyst_reports);
    const plan = state.research_decision;

    const prompt = [
      `You are the TRADER for ${state.asset} on ${state.trade_date}.`,
      ``,
      `Turn the research manager's plan and the analyst reports into a trading proposal.`,
      `Crypto trades around the clock and moves fast; size the position for the conviction level.`,
      ``,
      `## Research Manager's Decision`,
      plan
        ? [`Recommendation: ${plan.verdict}`, `Confidence: ${(plan.confidence * 100).toFixed(0)}%`, plan.raw_output].join("\n")
        : `No investment plan is available.`,
      ``,
      formatAnalystReportsForPrompt(state.analyst_reports),
      ``,
      `## Lessons From Similar Past Situations`,
      this.reflections(situation),
      ``,
      `## Required Output Format (strict)`,
      `FINAL_ACTION: BUY | SELL | HOLD`,
      `CONFIDENCE: 0.0 to 1.0`,
      `POSITION_SIZE_PCT: 0 to ${this.maxPositionSizePct} (percentage of available capital)`,
      `RATIONALE: detailed explanation`,
      `FINAL TRANSACTION PROPOSAL: **BUY/HOLD/SELL**`,
    ].join("\n");

    const output = await this.generate(prompt, signal);
    const base = parseDecision(output, "HOLD");
    const requested = parsePositionSize(output);
    const size = requested === undefined ? undefined : Math.min(requested, this.maxPositionSizePct);
    if (requested !== undefined && size !== requested) {
      this.logger.warn(`${this.name}: position size ${requested}% capped at ${this.maxPositionSizePct}%`);
    }
    const decision: TraderDecision = size === undefined ? base : { ...base, position_size_pct: size };
    this.remember(state, situation, decision);
    this.logger.info(`${this.name}: ${decision.verdict}${size !== undefined ? ` ${size}%` : ""}`);
    return decision;
  }
}

/** Final say. Its parsed verdict passes through the override policy. */
export class RiskManager extends Synthesizer {
  protected readonly name = "Risk Manager";
  protected readonly source = "risk_manager";
  protected readonly tier = "deep";

  constructor(
    options: SynthesizerOptions,
    private readonly policy: RiskOverridePolicy,
  ) {
    super(options);
  }

  async synthesize(state: TradingState, signal?: AbortSignal): Promise<FinalDecisionRecord> {
    requireComplete(state.risk_debate, this.name);
    const trader = state.trader_decision;
    if (!trader) {
      throw new Error(`${this.name} requires a trader decision`);
    }
    const situation = situationSummary(state.asset, state.trade_date, state.analyst_reports);

    const prompt = [
      `You are the RISK MANAGER and final decision-maker for ${state.asset} on ${state.trade_date}.`,
      ``,
      `Weigh the risk debate and either confirm or change the trader's proposal.`,
      ``,
      `## Trader's Proposal`,
      `Action: ${trader.verdict}`,
      `Confidence: ${(trader.confidence * 100).toFixed(0)}%`,
      `Position Size: ${trader.position_size_pct ?? "unspecified"}%`,
      `Rationale: ${trader.rationale}`,
      ``,
      `## Risk Debate Transcript`,
      formatTranscript(state.risk_debate),
      ``,
      `## Lessons From Similar Past Situations`,
      this.reflections(situation),
      ``,
      `## Required Output Format (strict)`,
      `FINAL_ACTION: BUY | SELL | HOLD`,
      `CONFIDENCE: 0.0 to 1.0`,
      `RATIONALE: explanation, naming the risks that decided it`,
    ].join("\n");

    const parsed = parseDecision(await this.generate(prompt, signal), trader.verdict);
    const outcome = applyRiskPolicy(parsed.verdict, state, this.policy);
    const overridden = outcome.verdict !== trader.verdict;
    const overrideReason = overridden ? (outcome.reason ?? "the risk manager revised the proposal") : undefined;

    const record: FinalDecisionRecord = {
      ...parsed,
      verdict: outcome.verdict,
      rationale: overrideReason
        ? `${parsed.rationale}\n\nRisk override: Trader proposed ${trader.verdict}; final verdict ${outcome.verdict} because ${overrideReason}.`
        : parsed.rationale,
      trader_verdict: trader.verdict,
      overridden,
      ...(overrideReason ? { override_reason: overrideReason } : {}),
    };
    this.remember(state, situation, record);
    this.logger.info(`${this.name}: ${record.verdict}${overridden ? ` (overrode ${trader.verdict})` : ""}`);
    return record;
  }
}

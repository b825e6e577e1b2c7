import { z } from "zod";

// ── Enumerations ─────────────────────────────────────────────

export const verdictSchema = z.enum(["BUY", "SELL", "HOLD"]);
export type Verdict = z.infer<typeof verdictSchema>;

export const analystKindSchema = z.enum(["market", "onchain", "news", "social"]);
export type AnalystKind = z.infer<typeof analystKindSchema>;

export const ANALYST_KINDS = analystKindSchema.options;

export const debateRoleSchema = z.enum(["bull", "bear", "risky", "safe", "neutral"]);
export type DebateRole = z.infer<typeof debateRoleSchema>;

export const pipelineStageSchema = z.enum([
  "collecting_analysts",
  "research_debate",
  "trader_decision",
  "risk_debate",
  "final_decision",
  "complete",
  "aborted",
]);
export type PipelineStage = z.infer<typeof pipelineStageSchema>;

export const pipelineVariantIdSchema = z.enum(["crypto", "crypto_defi"]);
export type PipelineVariantId = z.infer<typeof pipelineVariantIdSchema>;

// ── Configuration ────────────────────────────────────────────

export const DEFAULT_SUPPORTED_TOKENS = [
  "BTC",
  "ETH",
  "SOL",
  "MATIC",
  "AVAX",
  "BNB",
  "ADA",
  "DOT",
  "LINK",
  "UNI",
];

export const riskOverridePolicySchema = z.object({
  downgrade_keywords: z
    .array(z.string().min(1))
    .default(["liquidity risk", "insufficient liquidity", "thin order book"]),
  downgrade_from: z.array(verdictSchema).default(["BUY"]),
  downgrade_to: verdictSchema.default("HOLD"),
  hold_on_insufficient_evidence: z.boolean().default(true),
  /** Live 24h volume below this downgrades like a flagged risk; 0 turns the rule off */
  min_liquidity_24h_usd: z.number().min(0).default(10_000_000),
});
export type RiskOverridePolicy = z.infer<typeof riskOverridePolicySchema>;

export const tradingConfigSchema = z.object({
  pipeline_variant: pipelineVariantIdSchema.default("crypto"),
  max_debate_rounds: z.number().int().min(1).max(10).default(1),
  max_risk_discuss_rounds: z.number().int().min(1).max(10).default(1),
  online_tools: z.boolean().default(true),
  enabled_analysts: z
    .array(analystKindSchema)
    .min(1)
    .transform((kinds) => [...new Set(kinds)])
    .default([...ANALYST_KINDS]),
  supported_tokens: z
    .array(z.string().min(1))
    .min(1)
    .transform((tokens) => [...new Set(tokens.map((t) => t.toUpperCase()))])
    .default(DEFAULT_SUPPORTED_TOKENS),
  memory_top_k: z.number().int().min(0).max(20).default(2),
  max_tool_calls_per_report: z.number().int().min(0).max(20).default(6),
  /** Cap on the trader's POSITION_SIZE_PCT */
  max_position_size_pct: z.number().gt(0).max(100).default(15),
  tool_timeout_ms: z.number().int().positive().default(30_000),
  generation_timeout_ms: z.number().int().positive().default(180_000),
  quick_think_model: z.string().min(1).default("haiku"),
  deep_think_model: z.string().min(1).default("sonnet"),
  risk_policy: riskOverridePolicySchema.default({}),
  risk_manager_fallback: z.enum(["abort", "hold"]).default("abort"),
});
export type TradingConfig = z.infer<typeof tradingConfigSchema>;

// ── Analyst Reports ──────────────────────────────────────────

export const analystReportSchema = z.object({
  analyst: analystKindSchema,
  analyst_name: z.string(),
  status: z.enum(["done", "synthesis_failure"]),
  report: z.string(),
  /** Some expected data was missing (failed calls, or no tools at all) */
  degraded: z.boolean(),
  /** At least one tool call returned data */
  data_available: z.boolean(),
  tools_attempted: z.number().int().min(0),
  tools_failed: z.number().int().min(0),
  /** 24h trading volume read from a successful price-data call */
  volume_24h_usd: z.number().min(0).optional(),
  started_at: z.string(),
  ended_at: z.string(),
});
export type AnalystReport = z.infer<typeof analystReportSchema>;

// ── Debates ──────────────────────────────────────────────────

export const debateTurnSchema = z.object({
  role: debateRoleSchema,
  round: z.number().int().min(1),
  text: z.string(),
  timestamp: z.string(),
  degraded: z.boolean().default(false),
  reflections_used: z.number().int().min(0).default(0),
});
export type DebateTurn = z.infer<typeof debateTurnSchema>;

export const debateTranscriptSchema = z.object({
  kind: z.enum(["research", "risk"]),
  roles: z.array(debateRoleSchema).min(2),
  max_rounds: z.number().int().min(1),
  status: z.enum(["pending", "running", "complete", "cancelled"]),
  rounds_completed: z.number().int().min(0),
  turns: z.array(debateTurnSchema),
});
export type DebateTranscript = z.infer<typeof debateTranscriptSchema>;

// ── Decisions ────────────────────────────────────────────────

export const decisionSchema = z.object({
  verdict: verdictSchema,
  rationale: z.string(),
  confidence: z.number().min(0).max(1),
  degraded: z.boolean(),
  raw_output: z.string(),
});
export type Decision = z.infer<typeof decisionSchema>;

export const traderDecisionSchema = decisionSchema.extend({
  position_size_pct: z.number().min(0).max(100).optional(),
});
export type TraderDecision = z.infer<typeof traderDecisionSchema>;

export const finalDecisionRecordSchema = decisionSchema.extend({
  trader_verdict: verdictSchema,
  overridden: z.boolean(),
  override_reason: z.string().optional(),
});
export type FinalDecisionRecord = z.infer<typeof finalDecisionRecordSchema>;

// ── Memory ───────────────────────────────────────────────────

export const memorySourceSchema = z.enum(["research_manager", "trader", "risk_manager"]);
export type MemorySource = z.infer<typeof memorySourceSchema>;

/** Awaiting an outcome before it can become a reflection */
export const memoryCandidateSchema = z.object({
  source: memorySourceSchema,
  situation: z.string(),
  rationale: z.string(),
  verdict: verdictSchema,
});
export type MemoryCandidate = z.infer<typeof memoryCandidateSchema>;

export const memoryRecordSchema = z.object({
  id: z.string(),
  situation: z.string(),
  embedding: z.array(z.number()).readonly(),
  reflection: z.string(),
  outcome: z.string(),
  source: memorySourceSchema.optional(),
  created_at: z.string(),
});
export type MemoryRecord = z.infer<typeof memoryRecordSchema>;

export const memoryFileSchema = z.object({
  embedding_model: z.string(),
  records: z.array(memoryRecordSchema),
});

// ── Trading State ────────────────────────────────────────────

export const runFailureSchema = z.object({
  stage: pipelineStageSchema,
  reason: z.string(),
});

export const tradingStateSchema = z.object({
  asset: z.string(),
  trade_date: z.string(),
  variant: pipelineVariantIdSchema,
  stage: pipelineStageSchema,
  analyst_reports: z.record(analystKindSchema, analystReportSchema),
  research_debate: debateTranscriptSchema,
  research_decision: decisionSchema.nullable(),
  trader_decision: traderDecisionSchema.nullable(),
  risk_debate: debateTranscriptSchema,
  final_decision: finalDecisionRecordSchema.nullable(),
  memory_candidates: z.array(memoryCandidateSchema),
  failure: runFailureSchema.nullable(),
});
export type TradingState = z.infer<typeof tradingStateSchema>;

/** Returned by a completed run */
export interface FinalDecision {
  verdict: Verdict;
  rationale: string;
  state: TradingState;
}

export const runOutcomeSchema = z.object({
  label: z.string().min(1),
  returns_pct: z.number().optional(),
});
export type RunOutcome = z.infer<typeof runOutcomeSchema>;

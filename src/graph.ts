import { AnalystAgent, runAnalystTeam } from "./analyst.js";
import { ANALYST_DEFINITIONS } from "./analysts.js";
import {
  DebateController,
  RESEARCH_PARTICIPANTS,
  RISK_PARTICIPANTS,
  createTranscript,
  situationSummary,
  type DebateContext,
} from "./debate.js";
import { ConfigurationError, PipelineAbortedError, SynthesisFailure, errorMessage } from "./errors.js";
import type { Generator } from "./generation.js";
import { silentLogger, type Logger } from "./logger.js";
import type { MemoryRetriever } from "./memory.js";
import { ResearchManager, RiskManager, Trader, type SynthesizerOptions } from "./synthesizers.js";
import type { ToolInvoker } from "./tools.js";
import { requiredTools, resolveVariant, toolsForAnalyst, type PipelineVariant } from "./variants.js";
import type {
  Decision,
  FinalDecision,
  FinalDecisionRecord,
  PipelineStage,
  TraderDecision,
  TradingConfig,
  TradingState,
} from "./types.js";

export interface TradingGraphDeps {
  generator: Generator;
  invoker: ToolInvoker;
  memory: MemoryRetriever;
  logger?: Logger;
  /** Clock for every timestamp in the trace */
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Called each time the run enters a stage, including "aborted" */
  onStage?: (stage: PipelineStage, state: TradingState) => void;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isValidTradeDate(date: string): boolean {
  if (!DATE_PATTERN.test(date)) return false;
  const parsed = new Date(`${date}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

export function createInitialState(
  asset: string,
  date: string,
  variant: PipelineVariant,
  config: TradingConfig,
): TradingState {
  return {
    asset,
    trade_date: date,
    variant: variant.id,
    stage: "collecting_analysts",
    analyst_reports: {},
    research_debate: createTranscript("research", ["bull", "bear"], config.max_debate_rounds),
    research_decision: null,
    trader_decision: null,
    risk_debate: createTranscript("risk", ["risky", "safe", "neutral"], config.max_risk_discuss_rounds),
    final_decision: null,
    memory_candidates: [],
    failure: null,
  };
}

/**
 * Runs the fixed pipeline: analysts, research debate, research manager,
 * trader, risk debate, risk manager. Only this class moves `state.stage`.
 */
export class TradingGraph {
  readonly variant: PipelineVariant;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly debates: DebateController;
  private readonly researchManager: ResearchManager;
  private readonly trader: Trader;
  private readonly riskManager: RiskManager;

  constructor(
    readonly config: TradingConfig,
    private readonly deps: TradingGraphDeps,
  ) {
    this.variant = resolveVariant(config);
    deps.invoker.validate(requiredTools(this.variant, config.supported_tokens));

    this.logger = (deps.logger ?? silentLogger).child("graph");
    this.now = deps.now ?? (() => new Date());

    this.debates = new DebateController({
      generator: deps.generator,
      memory: deps.memory,
      memoryTopK: config.memory_top_k,
      generationTimeoutMs: config.generation_timeout_ms,
      logger: this.logger.child("debate"),
      now: this.now,
    });

    const synthesizerOptions: SynthesizerOptions = {
      generator: deps.generator,
      memory: deps.memory,
      memoryTopK: config.memory_top_k,
      generationTimeoutMs: config.generation_timeout_ms,
      logger: this.logger.child("decision"),
    };
    this.researchManager = new ResearchManager(synthesizerOptions);
    this.trader = new Trader(synthesizerOptions, config.max_position_size_pct);
    this.riskManager = new RiskManager(synthesizerOptions, config.risk_policy);
  }

  /** Upper-cased symbol, or ConfigurationError when it is not supported */
  normalizeAsset(asset: string): string {
    const symbol = asset.trim().toUpperCase();
    if (!this.config.supported_tokens.includes(symbol)) {
      throw new ConfigurationError(`Unsupported asset '${asset}'`, [
        `supported_tokens: ${this.config.supported_tokens.join(", ")}`,
      ]);
    }
    return symbol;
  }

  async run(asset: string, date: string, options: RunOptions = {}): Promise<FinalDecision> {
    const symbol = this.normalizeAsset(asset);
    if (!isValidTradeDate(date)) {
      throw new ConfigurationError(`Invalid trade date '${date}'`, ["expected YYYY-MM-DD"]);
    }

    const state = createInitialState(symbol, date, this.variant, this.config);
    const { signal } = options;

    try {
      // ── Analysts ──
      this.enter(state, "collecting_analysts", options);
      state.analyst_reports = await this.collectReports(symbol, date, signal);
      this.checkCancelled(state, options);

      const situation = situationSummary(symbol, date, state.analyst_reports);
      const context: DebateContext = { asset: symbol, date, reports: state.analyst_reports, situation };

      // ── Research debate ──
      this.enter(state, "research_debate", options);
      await this.debates.run(state.research_debate, RESEARCH_PARTICIPANTS, context, signal);
      if (state.research_debate.status === "cancelled") {
        throw this.abort(state, "research_debate", "cancelled", options);
      }
      state.research_decision = await this.synthesizeOrHold(
        state,
        "research_debate",
        options,
        () => this.researchManager.synthesize(state, signal),
        (reason) => placeholderDecision(`Research manager unavailable: ${reason}`),
      );

      // ── Trader ──
      this.checkCancelled(state, options);
      this.enter(state, "trader_decision", options);
      state.trader_decision = await this.synthesizeOrHold<TraderDecision>(
        state,
        "trader_decision",
        options,
        () => this.trader.synthesize(state, signal),
        (reason) => placeholderDecision(`Trader unavailable: ${reason}`),
      );
      const traderDecision = state.trader_decision;

      // ── Risk debate ──
      this.checkCancelled(state, options);
      this.enter(state, "risk_debate", options);
      await this.debates.run(
        state.risk_debate,
        RISK_PARTICIPANTS,
        { ...context, traderDecision, investmentPlan: state.research_decision.raw_output },
        signal,
      );
      if (state.risk_debate.status === "cancelled") {
        throw this.abort(state, "risk_debate", "cancelled", options);
      }

      // ── Final decision ──
      this.checkCancelled(state, options);
      this.enter(state, "final_decision", options);
      state.final_decision = await this.finalDecision(state, traderDecision, options, signal);

      this.enter(state, "complete", options);
      this.logger.info(`${symbol} ${date}: ${state.final_decision.verdict}`);
      return { verdict: state.final_decision.verdict, rationale: state.final_decision.rationale, state };
    } catch (err: unknown) {
      if (err instanceof PipelineAbortedError) throw err;
      // state.stage still names the stage that was running
      throw this.abort(state, state.stage, errorMessage(err), options, err);
    }
  }

  private async collectReports(asset: string, date: string, signal?: AbortSignal) {
    const agents = this.config.enabled_analysts.map(
      (kind) =>
        new AnalystAgent(ANALYST_DEFINITIONS[kind], {
          generator: this.deps.generator,
          invoker: this.deps.invoker,
          maxToolCalls: this.config.max_tool_calls_per_report,
          generationTimeoutMs: this.config.generation_timeout_ms,
          logger: this.logger.child("analysts"),
          now: this.now,
        }),
    );
    return runAnalystTeam(
      agents,
      asset,
      date,
      (agent) => (this.config.online_tools ? toolsForAnalyst(this.variant, agent.definition, asset) : []),
      { signal, now: this.now, logger: this.logger.child("analysts") },
    );
  }

  private async synthesizeOrHold<T extends Decision>(
    state: TradingState,
    stage: PipelineStage,
    options: RunOptions,
    synthesize: () => Promise<T>,
    placeholder: (reason: string) => T,
  ): Promise<T> {
    try {
      return await synthesize();
    } catch (err: unknown) {
      if (options.signal?.aborted) throw this.abort(state, stage, "cancelled", options, err);
      if (!(err instanceof SynthesisFailure)) throw err;
      this.logger.warn(`${err.message}; continuing with a degraded HOLD`);
      return placeholder(errorMessage(err));
    }
  }

  private async finalDecision(
    state: TradingState,
    trader: TraderDecision,
    options: RunOptions,
    signal?: AbortSignal,
  ): Promise<FinalDecisionRecord> {
    try {
      return await this.riskManager.synthesize(state, signal);
    } catch (err: unknown) {
      if (signal?.aborted) throw this.abort(state, "final_decision", "cancelled", options, err);
      if (!(err instanceof SynthesisFailure) || this.config.risk_manager_fallback === "abort") {
        throw this.abort(state, "final_decision", `risk manager failed: ${errorMessage(err)}`, options, err);
      }
      this.logger.warn(`${err.message}; falling back to HOLD`);
      const overridden = trader.verdict !== "HOLD";
      const reason = "the risk manager produced no decision";
      return {
        ...placeholderDecision(`Risk manager unavailable: ${errorMessage(err)}`),
        rationale:
          `Risk manager unavailable: ${errorMessage(err)}` +
          (overridden ? `\n\nRisk override: Trader proposed ${trader.verdict}; final verdict HOLD because ${reason}.` : ""),
        trader_verdict: trader.verdict,
        overridden,
        ...(overridden ? { override_reason: reason } : {}),
      };
    }
  }

  private enter(state: TradingState, stage: PipelineStage, options: RunOptions): void {
    state.stage = stage;
    this.logger.info(`stage: ${stage}`);
    options.onStage?.(stage, state);
  }

  /** A cancel seen between stages is charged to the stage that just finished */
  private checkCancelled(state: TradingState, options: RunOptions): void {
    if (options.signal?.aborted) {
      throw this.abort(state, state.stage, "cancelled", options);
    }
  }

  private abort(
    state: TradingState,
    stage: PipelineStage,
    reason: string,
    options: RunOptions,
    cause?: unknown,
  ): PipelineAbortedError {
    state.failure = { stage, reason };
    state.stage = "aborted";
    this.logger.error(`aborted during ${stage}: ${reason}`);
    options.onStage?.("aborted", state);
    return new PipelineAbortedError(stage, reason, state, { cause });
  }
}

function placeholderDecision(rationale: string): Decision {
  return { verdict: "HOLD", rationale, confidence: 0, degraded: true, raw_output: "" };
}

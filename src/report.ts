import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import { RUNS_DIR } from "./paths.js";
import { readJson, writeJsonAtomic, writeTextAtomic } from "./state.js";
import { ROLE_NAMES, orderedReports } from "./debate.js";
import { tradingStateSchema, type Decision, type DebateTranscript, type TradingState } from "./types.js";

function formatDecision(title: string, decision: Decision | null): string[] {
  if (!decision) return [`## ${title}`, "", "_Not reached._"];
  return [
    `## ${title}`,
    "",
    `Verdict: **${decision.verdict}** (confidence ${(decision.confidence * 100).toFixed(0)}%)` +
      (decision.degraded ? " _degraded_" : ""),
    "",
    decision.rationale,
  ];
}

function formatDebate(title: string, debate: DebateTranscript): string[] {
  const lines = [
    `## ${title}`,
    "",
    `Status: ${debate.status}, ${debate.rounds_completed}/${debate.max_rounds} round(s)`,
  ];
  for (const turn of debate.turns) {
    lines.push(
      "",
      `### Round ${turn.round}: ${ROLE_NAMES[turn.role]}${turn.degraded ? " _degraded_" : ""}`,
      "",
      turn.text,
    );
  }
  return lines;
}

/** Markdown report of every stage the run reached */
export function formatRunReport(state: TradingState): string {
  const sections: string[] = [
    `# ${state.asset} Trading Report (${state.trade_date})`,
    "",
    `Pipeline: ${state.variant}`,
    `Stage: ${state.stage}`,
  ];

  if (state.final_decision) {
    const final = state.final_decision;
    sections.push(`Final verdict: **${final.verdict}**`);
    if (final.overridden) {
      sections.push(`Trader proposed ${final.trader_verdict}; overridden (${final.override_reason ?? "risk manager"})`);
    }
  }
  if (state.failure) {
    sections.push(`Aborted during ${state.failure.stage}: ${state.failure.reason}`);
  }

  sections.push("", "---", "", "## Analyst Reports");
  const reports = orderedReports(state.analyst_reports);
  if (reports.length === 0) sections.push("", "_No reports._");
  for (const r of reports) {
    const flags = [
      r.status === "synthesis_failure" ? "failed" : null,
      r.degraded ? "degraded" : null,
      r.data_available ? null : "no live data",
    ].filter((f): f is string => f !== null);
    sections.push(
      "",
      `### ${r.analyst_name}${flags.length > 0 ? ` (${flags.join(", ")})` : ""}`,
      "",
      `Tool calls: ${r.tools_attempted} attempted, ${r.tools_failed} failed`,
      "",
      r.report,
    );
  }

  sections.push("", "---", "", ...formatDebate("Research Debate", state.research_debate));
  sections.push("", "---", "", ...formatDecision("Research Manager", state.research_decision));
  sections.push("", "---", "", ...formatDecision("Trader", state.trader_decision));
  if (state.trader_decision?.position_size_pct !== undefined) {
    sections.push("", `Position size: ${state.trader_decision.position_size_pct}%`);
  }
  sections.push("", "---", "", ...formatDebate("Risk Debate", state.risk_debate));
  sections.push("", "---", "", ...formatDecision("Risk Manager (final)", state.final_decision));

  return sections.join("\n") + "\n";
}

export interface SavedRun {
  markdownPath: string;
  jsonPath: string;
}

export async function saveRunResult(state: TradingState, dir: string = RUNS_DIR): Promise<SavedRun> {
  const base = join(dir, `${state.asset}_${state.trade_date}`);
  const saved = { markdownPath: `${base}.md`, jsonPath: `${base}.json` };
  await writeTextAtomic(saved.markdownPath, formatRunReport(state));
  await writeJsonAtomic(saved.jsonPath, state);
  return saved;
}

export async function loadRunResult(filePath: string): Promise<TradingState> {
  const parsed = tradingStateSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid run trace ${filePath}`,
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data;
}

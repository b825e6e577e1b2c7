import { errorMessage } from "./errors.js";
import { generateWithin, type Generator } from "./generation.js";
import { formatReflections, type MemoryRetriever, type RetrievedMemory } from "./memory.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  ANALYST_KINDS,
  type AnalystKind,
  type AnalystReport,
  type DebateRole,
  type DebateTranscript,
  type TraderDecision,
} from "./types.js";

// ── Shared context ───────────────────────────────────────────

export type AnalystReports = Partial<Record<AnalystKind, AnalystReport>>;

/** Reports in fixed analyst order, independent of completion order */
export function orderedReports(reports: AnalystReports): AnalystReport[] {
  return ANALYST_KINDS.flatMap((kind) => {
    const report = reports[kind];
    return report ? [report] : [];
  });
}

export function formatAnalystReportsForPrompt(reports: AnalystReports): string {
  const ordered = orderedReports(reports);
  if (ordered.length === 0) return "## Analyst Team Reports\n\nNo analyst reports were produced.";

  const sections: string[] = ["## Analyst Team Reports", ""];
  for (const r of ordered) {
    const flags = [r.degraded ? "degraded" : null, r.data_available ? null : "no live data"]
      .filter((f): f is string => f !== null)
      .join(", ");
    sections.push(`### ${r.analyst_name}${flags ? ` (${flags})` : ""}`, r.report, "");
  }
  return sections.join("\n");
}

/** Text used to look up past reflections for this run */
export function situationSummary(asset: string, date: string, reports: AnalystReports): string {
  return [`${asset} on ${date}`, ...orderedReports(reports).map((r) => r.report)].join("\n\n");
}

export interface DebateContext {
  asset: string;
  date: string;
  reports: AnalystReports;
  situation: string;
  /** Present for the risk debate */
  traderDecision?: TraderDecision | null;
  /** Research manager's plan, for the risk debate */
  investmentPlan?: string;
}

// ── Transcript ───────────────────────────────────────────────

export function createTranscript(
  kind: DebateTranscript["kind"],
  roles: DebateRole[],
  maxRounds: number,
): DebateTranscript {
  return { kind, roles, max_rounds: maxRounds, status: "pending", rounds_completed: 0, turns: [] };
}

export const ROLE_NAMES: Record<DebateRole, string> = {
  bull: "Bull Researcher",
  bear: "Bear Researcher",
  risky: "Risky Analyst",
  safe: "Safe Analyst",
  neutral: "Neutral Analyst",
};

export function formatTranscript(transcript: DebateTranscript): string {
  if (transcript.turns.length === 0) return "(no arguments yet)";
  const lines: string[] = [];
  let round = 0;
  for (const turn of transcript.turns) {
    if (turn.round !== round) {
      round = turn.round;
      lines.push(`### Round ${round}`, "");
    }
    lines.push(`**${ROLE_NAMES[turn.role]}:**`, turn.text, "");
  }
  return lines.join("\n").trimEnd();
}

// ── Participants ─────────────────────────────────────────────

export interface TurnInput {
  context: DebateContext;
  transcript: DebateTranscript;
  round: number;
  reflections: readonly RetrievedMemory[];
}

export interface DebateParticipant {
  role: DebateRole;
  name: string;
  buildPrompt(input: TurnInput): string;
}

function lastTurnBy(transcript: DebateTranscript, roles: DebateRole[]): string | null {
  for (let i = transcript.turns.length - 1; i >= 0; i--) {
    const turn = transcript.turns[i];
    if (roles.includes(turn.role)) return `${ROLE_NAMES[turn.role]}: ${turn.text}`;
  }
  return null;
}

function researcher(role: "bull" | "bear"): DebateParticipant {
  const opponent = role === "bull" ? "bear" : "bull";
  const stance =
    role === "bull"
      ? [
          `Build a strong, evidence-based case for investing in the asset:`,
          `growth potential, adoption, network strength and positive market indicators.`,
        ]
      : [
          `Build a well-reasoned case against investing or for caution:`,
          `downside risks, weak fundamentals, negative indicators and adverse news.`,
        ];
  return {
    role,
    name: ROLE_NAMES[role],
    buildPrompt({ context, transcript, round, reflections }) {
      const last = lastTurnBy(transcript, [opponent]);
      return [
        `You are the ${ROLE_NAMES[role].toUpperCase()} analysing ${context.asset} on ${context.date}.`,
        `This is round ${round} of ${transcript.max_rounds} in an investment debate.`,
        ``,
        ...stance,
        ``,
        formatAnalystReportsForPrompt(context.reports),
        ``,
        `## Debate So Far`,
        formatTranscript(transcript),
        ``,
        `## ${ROLE_NAMES[opponent]}'s Last Argument`,
        last ?? `None yet. You are presenting the opening ${role}ish case.`,
        ``,
        `## Lessons From Similar Past Situations`,
        formatReflections(reflections),
        ``,
        `## Instructions`,
        `1. Argue from the analyst reports; cite specific figures where they exist`,
        `2. Directly counter the opposing argument instead of only listing facts`,
        `3. Treat any report marked "no live data" as unverified`,
        `4. Apply the lessons above where they are relevant`,
        ``,
        `Write your argument conversationally, then end with:`,
        `KEY_POINTS:`,
        `- point 1`,
        `- point 2`,
      ].join("\n");
    },
  };
}

const RISK_STANCES: Record<"risky" | "safe" | "neutral", string[]> = {
  risky: [
    `Champion high-reward opportunities and bold positioning.`,
    `Argue for acting on conviction and challenge overly cautious views with data.`,
  ],
  safe: [
    `Prioritize capital preservation and downside protection.`,
    `Highlight volatility, liquidity and tail risks and challenge optimistic assumptions.`,
  ],
  neutral: [
    `Weigh upside and downside objectively and focus on risk-adjusted outcomes.`,
    `Mediate between the risky and safe views and find the rational middle ground.`,
  ],
};

function riskDebater(role: "risky" | "safe" | "neutral"): DebateParticipant {
  const others = (["risky", "safe", "neutral"] as const).filter((r) => r !== role);
  return {
    role,
    name: ROLE_NAMES[role],
    buildPrompt({ context, transcript, round, reflections }) {
      const proposal = context.traderDecision;
      return [
        `You are the ${ROLE_NAMES[role].toUpperCase()} on the risk team reviewing a ${context.asset} trade on ${context.date}.`,
        `This is round ${round} of ${transcript.max_rounds} in a risk management debate.`,
        ``,
        ...RISK_STANCES[role],
        ``,
        `## Trader's Proposal`,
        proposal
          ? [
              `Action: ${proposal.verdict}`,
              `Confidence: ${(proposal.confidence * 100).toFixed(0)}%`,
              `Position Size: ${proposal.position_size_pct ?? "unspecified"}%`,
              `Rationale: ${proposal.rationale}`,
            ].join("\n")
          : `No trader proposal is available.`,
        ``,
        context.investmentPlan ? `## Research Manager's Plan\n${context.investmentPlan}\n` : "",
        formatAnalystReportsForPrompt(context.reports),
        ``,
        `## Debate So Far`,
        formatTranscript(transcript),
        ``,
        `## Latest From Other Risk Analysts`,
        ...others.map((o) => lastTurnBy(transcript, [o]) ?? `${ROLE_NAMES[o]}: (no response yet)`),
        ``,
        `## Lessons From Similar Past Situations`,
        formatReflections(reflections),
        ``,
        `## Instructions`,
        `1. Evaluate the proposal from your perspective`,
        `2. Respond directly to the other risk analysts' points`,
        `3. Be specific about which risks matter for this trade and why`,
        ``,
        `Write your argument, then end with these two lines:`,
        `RISK_RECOMMENDATION: approve | adjust | reject`,
        `RISK_FLAGS: comma-separated risks you judge serious enough to block the trade, or none`,
      ].join("\n");
    },
  };
}

export const RESEARCH_PARTICIPANTS: readonly DebateParticipant[] = [researcher("bull"), researcher("bear")];

export const RISK_PARTICIPANTS: readonly DebateParticipant[] = [
  riskDebater("risky"),
  riskDebater("safe"),
  riskDebater("neutral"),
];

// ── Controller ───────────────────────────────────────────────

export interface DebateControllerOptions {
  generator: Generator;
  memory: MemoryRetriever;
  memoryTopK: number;
  generationTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Runs a fixed-length, round-robin debate. Every round gives each role in
 * `transcript.roles` exactly one turn; there is no early exit.
 */
export class DebateController {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: DebateControllerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async run(
    transcript: DebateTranscript,
    participants: readonly DebateParticipant[],
    context: DebateContext,
    signal?: AbortSignal,
  ): Promise<DebateTranscript> {
    const byRole = new Map(participants.map((p) => [p.role, p]));
    for (const role of transcript.roles) {
      if (!byRole.has(role)) throw new Error(`No debate participant for role '${role}'`);
    }

    transcript.status = "running";
    for (let round = transcript.rounds_completed + 1; round <= transcript.max_rounds; round++) {
      for (const role of transcript.roles) {
        const participant = byRole.get(role);
        if (!participant) continue;
        if (signal?.aborted) {
          transcript.status = "cancelled";
          this.logger.warn(`${transcript.kind} debate cancelled in round ${round}`);
          return transcript;
        }

        const reflections = this.retrieve(context.situation);
        const prompt = participant.buildPrompt({ context, transcript, round, reflections });

        let text: string;
        let degraded = false;
        try {
          text = await generateWithin(
            this.options.generator,
            prompt,
            { agent: participant.name, tier: "quick", signal },
            this.options.generationTimeoutMs,
          );
        } catch (err: unknown) {
          if (signal?.aborted) {
            transcript.status = "cancelled";
            return transcript;
          }
          degraded = true;
          text = `[no argument produced] ${errorMessage(err)}`;
          this.logger.warn(`${participant.name} round ${round}: ${errorMessage(err)}`);
        }

        transcript.turns.push({
          role,
          round,
          text,
          timestamp: this.now().toISOString(),
          degraded,
          reflections_used: reflections.length,
        });
      }
      transcript.rounds_completed = round;
    }

    transcript.status = "complete";
    return transcript;
  }

  private retrieve(situation: string): readonly RetrievedMemory[] {
    try {
      return this.options.memory.retrieve(situation, this.options.memoryTopK);
    } catch (err: unknown) {
      this.logger.warn(`memory retrieval failed, continuing without reflections: ${errorMessage(err)}`);
      return [];
    }
  }
}

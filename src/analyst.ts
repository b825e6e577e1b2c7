import { SynthesisFailure, errorMessage } from "./errors.js";
import { generateWithin, type Generator } from "./generation.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseVolume24h } from "./sources/coingecko.js";
import type { ToolCall, ToolInvoker } from "./tools.js";
import type { AnalystDefinition } from "./analysts.js";
import type { AnalystKind, AnalystReport } from "./types.js";

export type AnalystPhase = "idle" | "awaiting_tool_results" | "synthesizing" | "done";

/** Prefixed to any report written without a single successful data fetch */
export const DATA_UNAVAILABLE_CAVEAT =
  "[DATA UNAVAILABLE] No live data could be retrieved for this report. " +
  "The analysis below relies on general knowledge only and must not be read as current market evidence.";

const TOOL_CALL_PATTERN = /^\s*TOOL_CALL:\s*([A-Za-z0-9_]+)\s*(.*)$/;

/** Extract `TOOL_CALL: <name> <json>` lines from a model reply */
export function parseToolCalls(reply: string): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const line of reply.split("\n")) {
    const match = line.match(TOOL_CALL_PATTERN);
    if (!match) continue;
    const rawArgs = match[2].trim();
    let args: unknown = {};
    if (rawArgs.length > 0) {
      try {
        args = JSON.parse(rawArgs);
      } catch {
        args = rawArgs;
      }
    }
    calls.push({ capability: match[1], args });
  }
  return calls;
}

/** Text after FINAL_REPORT: when present, otherwise the whole reply */
export function extractReport(reply: string): string {
  const marker = reply.indexOf("FINAL_REPORT:");
  const body = marker >= 0 ? reply.slice(marker + "FINAL_REPORT:".length) : reply;
  return body.trim();
}

export interface AnalystAgentOptions {
  generator: Generator;
  invoker: ToolInvoker;
  maxToolCalls: number;
  generationTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * One analyst's tool-using report loop. The model requests data with
 * TOOL_CALL lines; a reply without any is taken as the report.
 */
export class AnalystAgent {
  private readonly phaseLog: AnalystPhase[] = ["idle"];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly definition: AnalystDefinition,
    private readonly options: AnalystAgentOptions,
  ) {
    this.logger = (options.logger ?? silentLogger).child(definition.kind);
    this.now = options.now ?? (() => new Date());
  }

  get kind(): AnalystKind {
    return this.definition.kind;
  }

  /** Phases entered so far, in order */
  get phases(): readonly AnalystPhase[] {
    return this.phaseLog;
  }

  private enter(phase: AnalystPhase): void {
    if (this.phaseLog[this.phaseLog.length - 1] !== phase) this.phaseLog.push(phase);
  }

  async run(
    asset: string,
    date: string,
    enabledTools: readonly string[],
    signal?: AbortSignal,
  ): Promise<AnalystReport> {
    const startedAt = this.now().toISOString();
    const { generator, invoker, maxToolCalls, generationTimeoutMs } = this.options;
    const context = { agent: this.definition.name, tier: "quick" as const, signal };

    let attempted = 0;
    let failed = 0;
    let succeeded = 0;
    let volume24h: number | undefined;
    const notes: string[] = [];
    const exchange: string[] = [];
    let body: string | null = null;

    const toolsUsable = enabledTools.length > 0 && maxToolCalls > 0;
    let prompt = buildAnalystPrompt(this.definition, asset, date, toolsUsable ? invoker.describeTools(enabledTools) : null);

    while (body === null) {
      const reply = await generateWithin(generator, prompt, context, generationTimeoutMs);
      const requests = toolsUsable ? parseToolCalls(reply) : [];

      if (requests.length === 0) {
        this.enter("synthesizing");
        body = extractReport(reply);
        break;
      }

      if (attempted >= maxToolCalls) {
        this.logger.info(`tool call limit (${maxToolCalls}) reached, dropping ${requests.length} request(s)`);
        break;
      }

      this.enter("awaiting_tool_results");
      exchange.push(`ASSISTANT:\n${reply}`);
      for (const request of requests) {
        if (attempted >= maxToolCalls) break;
        attempted++;

        if (!enabledTools.includes(request.capability)) {
          failed++;
          const message = `${request.capability} is not available to this analyst`;
          notes.push(`- [degraded] ${request.capability}: not available`);
          exchange.push(`TOOL_ERROR ${request.capability}: ${message}`);
          continue;
        }

        const result = await invoker.invoke(request.capability, request.args, signal);
        if (result.ok) {
          succeeded++;
          volume24h = parseVolume24h(result.text) ?? volume24h;
          exchange.push(`TOOL_RESULT ${result.capability}:\n${result.text}`);
        } else {
          failed++;
          notes.push(`- [degraded] ${result.capability} (${result.failure}): ${result.message}`);
          exchange.push(`TOOL_ERROR ${result.capability} (${result.failure}): ${result.message}`);
        }
      }

      const remaining = maxToolCalls - attempted;
      prompt = [
        buildAnalystPrompt(this.definition, asset, date, invoker.describeTools(enabledTools)),
        "",
        "## Data gathered so far",
        ...exchange,
        "",
        remaining > 0
          ? `You may make up to ${remaining} more TOOL_CALL request(s), or write the final report now.`
          : "No more tool calls are allowed. Write the final report now.",
      ].join("\n");
    }

    if (body === null) {
      this.enter("synthesizing");
      const finalPrompt = [
        buildAnalystPrompt(this.definition, asset, date, null),
        "",
        "## Data gathered",
        ...exchange,
        "",
        "The tool call limit has been reached. Write the final report now from the data above.",
      ].join("\n");
      body = extractReport(await generateWithin(generator, finalPrompt, context, generationTimeoutMs));
    }

    if (body.length === 0) {
      throw new SynthesisFailure(this.definition.name, "report was empty");
    }

    const dataAvailable = succeeded > 0;
    let report = body;
    if (notes.length > 0) {
      report += `\n\n### Data notes\n${notes.join("\n")}`;
    }
    if (!dataAvailable) {
      report = `${DATA_UNAVAILABLE_CAVEAT}\n\n${report}`;
    }

    this.enter("done");
    this.logger.info(`report ready: ${attempted} call(s), ${failed} failed`);

    return {
      analyst: this.definition.kind,
      analyst_name: this.definition.name,
      status: "done",
      report,
      degraded: !dataAvailable || failed > 0,
      data_available: dataAvailable,
      tools_attempted: attempted,
      tools_failed: failed,
      ...(volume24h !== undefined ? { volume_24h_usd: volume24h } : {}),
      started_at: startedAt,
      ended_at: this.now().toISOString(),
    };
  }
}

export function buildAnalystPrompt(
  def: AnalystDefinition,
  asset: string,
  date: string,
  toolList: string | null,
): string {
  const lines = [
    `You are ${def.role}, preparing a report on ${asset} for a trading team. The current date is ${date}.`,
    ``,
    `Focus on:`,
    ...def.focus.map((f) => `- ${f}`),
    ``,
  ];

  if (toolList) {
    lines.push(
      `Data tools available to you:`,
      toolList,
      ``,
      `To fetch data, reply with one line per request and nothing else:`,
      `TOOL_CALL: <tool_name> <JSON arguments>`,
      `Example: TOOL_CALL: get_crypto_price_data {"symbol": "${asset}", "days": 30}`,
      ``,
      `When you have enough data, reply with the report, starting with the line FINAL_REPORT:`,
    );
  } else {
    lines.push(
      `No data tools are available for this report. Say plainly that no live data was retrieved,`,
      `then reason from general knowledge. Start the report with the line FINAL_REPORT:`,
    );
  }

  lines.push(
    ``,
    `Write the report in markdown with a short summary table of key points.`,
    `End with ${def.signal}: bullish | neutral | bearish`,
  );
  return lines.join("\n");
}

/**
 * Run analysts concurrently and wait for all of them. A failed analyst
 * yields a placeholder report instead of failing the team.
 */
export async function runAnalystTeam(
  agents: readonly AnalystAgent[],
  asset: string,
  date: string,
  toolsFor: (agent: AnalystAgent) => readonly string[],
  options: { signal?: AbortSignal; now?: () => Date; logger?: Logger } = {},
): Promise<Partial<Record<AnalystKind, AnalystReport>>> {
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;
  const startedAt = now().toISOString();

  const results = await Promise.allSettled(
    agents.map((agent) => agent.run(asset, date, toolsFor(agent), options.signal)),
  );

  const reports: Partial<Record<AnalystKind, AnalystReport>> = {};
  results.forEach((r, i) => {
    const agent = agents[i];
    if (r.status === "fulfilled") {
      reports[agent.kind] = r.value;
      return;
    }
    const reason = errorMessage(r.reason);
    logger.warn(`${agent.definition.name} failed: ${reason}`);
    reports[agent.kind] = {
      analyst: agent.kind,
      analyst_name: agent.definition.name,
      status: "synthesis_failure",
      report: `Analysis unavailable: ${reason}`,
      degraded: true,
      data_available: false,
      tools_attempted: 0,
      tools_failed: 0,
      started_at: startedAt,
      ended_at: now().toISOString(),
    };
  });
  return reports;
}

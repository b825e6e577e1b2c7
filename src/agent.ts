import { query } from "@anthropic-ai/claude-agent-sdk";
import type { SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import type { GenerationContext, Generator, ModelTier } from "./generation.js";
import { silentLogger, type Logger } from "./logger.js";

// The agents only reason over text they are given; no file, shell or web access
const BUILTIN_TOOLS = [
  "Bash",
  "Read",
  "Write",
  "Edit",
  "Glob",
  "Grep",
  "WebFetch",
  "WebSearch",
  "Task",
  "NotebookEdit",
  "TodoWrite",
];

// ── Types ────────────────────────────────────────────────────

export interface AgentQueryOptions {
  prompt: string;
  model: string;
  systemPrompt?: string;
  /** Maximum conversation turns (default: 1) */
  maxTurns?: number;
  /** Aborts the query when it fires */
  signal?: AbortSignal;
  /** Callback for each SDK message (streaming progress, logging, etc.) */
  onMessage?: (message: SDKMessage) => void;
}

export interface AgentQueryResult {
  output: string;
  cost_usd: number;
  duration_ms: number;
  num_turns: number;
  status: "success" | "error_max_turns" | "error";
  error?: string;
}

// ── Core Query Wrapper ──────────────────────────────────────

/**
 * Run a single text-only Claude Agent SDK query.
 * Never throws; failures are reported through `status` and `error`.
 */
export async function runAgentQuery(options: AgentQueryOptions): Promise<AgentQueryResult> {
  const abortController = new AbortController();
  const onAbort = () => abortController.abort();
  if (options.signal?.aborted) {
    abortController.abort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  const startTime = Date.now();
  let output = "";
  let costUsd = 0;
  let numTurns = 0;
  let status: AgentQueryResult["status"] = "success";
  let error: string | undefined;

  try {
    for await (const message of query({
      prompt: options.prompt,
      options: {
        model: options.model,
        maxTurns: options.maxTurns ?? 1,
        ...(options.systemPrompt ? { systemPrompt: options.systemPrompt } : {}),
        disallowedTools: BUILTIN_TOOLS,
        abortController,
      },
    })) {
      options.onMessage?.(message);

      if (message.type === "result") {
        costUsd = message.total_cost_usd;
        numTurns = message.num_turns;
        if (message.subtype === "success") {
          output = message.result;
        } else {
          status = message.subtype === "error_max_turns" ? "error_max_turns" : "error";
          error = message.subtype;
        }
      }
    }
  } catch (err) {
    status = "error";
    error = err instanceof Error ? err.message : String(err);
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }

  return {
    output,
    cost_usd: costUsd,
    duration_ms: Date.now() - startTime,
    num_turns: numTurns,
    status,
    error,
  };
}

// ── Generator ────────────────────────────────────────────────

export interface AgentSdkGeneratorOptions {
  models: Record<ModelTier, string>;
  logger?: Logger;
}

/** Generator backed by the Claude Agent SDK, one query per call */
export class AgentSdkGenerator implements Generator {
  private readonly logger: Logger;

  constructor(private readonly options: AgentSdkGeneratorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async generate(prompt: string, context: GenerationContext): Promise<string> {
    const model = this.options.models[context.tier];
    const result = await runAgentQuery({
      prompt,
      model,
      systemPrompt: context.system,
      signal: context.signal,
    });
    this.logger.debug(
      `${context.agent} (${model}): ${result.status} in ${result.duration_ms}ms, $${result.cost_usd.toFixed(4)}`,
    );
    if (result.status !== "success") {
      throw new Error(`${model} query failed: ${result.error ?? result.status}`);
    }
    return result.output;
  }
}

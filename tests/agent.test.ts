import { describe, it, expect, vi, beforeEach } from "vitest";

/**
 * Tests for src/agent.ts, the Agent SDK wrapper behind AgentSdkGenerator.
 * The SDK query function is mocked to yield scripted messages.
 */

// ── SDK mock setup ────────────────────────────────────────────

let mockMessages: Array<Record<string, unknown>> = [];
let mockFailure: Error | null = null;
let capturedQueryParams: Record<string, unknown> | null = null;

vi.mock("@anthropic-ai/claude-agent-sdk", () => ({
  query: vi.fn((params: Record<string, unknown>) => {
    capturedQueryParams = params;
    return {
      [Symbol.asyncIterator]: async function* () {
        for (const msg of mockMessages) {
          yield msg;
        }
        if (mockFailure) throw mockFailure;
      },
    };
  }),
}));

import { AgentSdkGenerator, runAgentQuery } from "../src/agent.js";

const successResult = (result: string) => ({
  type: "result",
  subtype: "success",
  result,
  total_cost_usd: 0.0125,
  num_turns: 1,
});

function capturedOptions(): Record<string, unknown> {
  const options = capturedQueryParams?.options;
  if (typeof options !== "object" || options === null) throw new Error("query was not called with options");
  return { ...options };
}

beforeEach(() => {
  mockMessages = [];
  mockFailure = null;
  capturedQueryParams = null;
});

// ── runAgentQuery ─────────────────────────────────────────────

describe("runAgentQuery", () => {
  it("returns the result text, cost and turns of a successful query", async () => {
    mockMessages = [{ type: "system", subtype: "init" }, successResult("BUY it")];

    const result = await runAgentQuery({ prompt: "Decide.", model: "claude-haiku" });

    expect(result).toMatchObject({ output: "BUY it", cost_usd: 0.0125, num_turns: 1, status: "success" });
    expect(result.error).toBeUndefined();
    expect(capturedQueryParams?.prompt).toBe("Decide.");
  });

  it("passes the model, one turn and no built-in tools to the SDK", async () => {
    mockMessages = [successResult("ok")];

    await runAgentQuery({ prompt: "p", model: "claude-opus", systemPrompt: "You are a trader." });

    const options = capturedOptions();
    expect(options.model).toBe("claude-opus");
    expect(options.maxTurns).toBe(1);
    expect(options.systemPrompt).toBe("You are a trader.");
    expect(options.disallowedTools).toContain("Bash");
    expect(options.disallowedTools).toContain("WebFetch");
  });

  it("omits the system prompt when none is given", async () => {
    mockMessages = [successResult("ok")];
    await runAgentQuery({ prompt: "p", model: "m" });
    expect("systemPrompt" in capturedOptions()).toBe(false);
  });

  it("reports max-turn and other error results", async () => {
    mockMessages = [{ type: "result", subtype: "error_max_turns", total_cost_usd: 0, num_turns: 3 }];
    const maxTurns = await runAgentQuery({ prompt: "p", model: "m" });
    expect(maxTurns).toMatchObject({ status: "error_max_turns", error: "error_max_turns", output: "", num_turns: 3 });

    mockMessages = [{ type: "result", subtype: "error_during_execution", total_cost_usd: 0, num_turns: 1 }];
    const failed = await runAgentQuery({ prompt: "p", model: "m" });
    expect(failed).toMatchObject({ status: "error", error: "error_during_execution" });
  });

  it("turns a thrown SDK error into an error status", async () => {
    mockFailure = new Error("connection reset");
    const result = await runAgentQuery({ prompt: "p", model: "m" });
    expect(result).toMatchObject({ status: "error", error: "connection reset", output: "" });
  });

  it("forwards every message to onMessage", async () => {
    mockMessages = [{ type: "assistant" }, successResult("ok")];
    const seen: string[] = [];
    await runAgentQuery({ prompt: "p", model: "m", onMessage: (m) => seen.push(m.type) });
    expect(seen).toEqual(["assistant", "result"]);
  });

  it("aborts the SDK query when the caller's signal already fired", async () => {
    mockMessages = [successResult("ok")];
    const controller = new AbortController();
    controller.abort();

    await runAgentQuery({ prompt: "p", model: "m", signal: controller.signal });

    const abortController = capturedOptions().abortController;
    expect(abortController).toBeInstanceOf(AbortController);
    if (abortController instanceof AbortController) {
      expect(abortController.signal.aborted).toBe(true);
    }
  });
});

// ── AgentSdkGenerator ─────────────────────────────────────────

describe("AgentSdkGenerator", () => {
  const generator = new AgentSdkGenerator({ models: { quick: "claude-haiku", deep: "claude-opus" } });

  it("maps the tier to its configured model", async () => {
    mockMessages = [successResult("report")];
    await expect(generator.generate("p", { agent: "Market Analyst", tier: "quick" })).resolves.toBe("report");
    expect(capturedOptions().model).toBe("claude-haiku");

    mockMessages = [successResult("plan")];
    await generator.generate("p", { agent: "Research Manager", tier: "deep", system: "Judge the debate." });
    expect(capturedOptions().model).toBe("claude-opus");
    expect(capturedOptions().systemPrompt).toBe("Judge the debate.");
  });

  it("throws when the query does not succeed", async () => {
    mockMessages = [{ type: "result", subtype: "error_max_turns", total_cost_usd: 0, num_turns: 1 }];
    await expect(generator.generate("p", { agent: "Trader", tier: "deep" })).rejects.toThrow(
      "claude-opus query failed: error_max_turns",
    );
  });
});

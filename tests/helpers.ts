import { defineCapability, CAPABILITY_NAMES, ToolInvoker, type Capability, type CapabilityName } from "../src/tools.js";
import type { GenerationContext, Generator, ModelTier } from "../src/generation.js";
import { z } from "zod";

// ── Scripted generator ────────────────────────────────────────

export type Responder = (prompt: string, context: GenerationContext) => string | Promise<string>;

export interface RecordedCall {
  agent: string;
  tier: ModelTier;
  prompt: string;
}

/** In-process Generator: answers come from `respond`, every call is recorded */
export class ScriptedGenerator implements Generator {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder) {}

  async generate(prompt: string, context: GenerationContext): Promise<string> {
    this.calls.push({ agent: context.agent, tier: context.tier, prompt });
    return this.respond(prompt, context);
  }

  agents(): string[] {
    return this.calls.map((c) => c.agent);
  }
}

export const SCRIPT: Record<string, string> = {
  "Market Analyst": "FINAL_REPORT:\nPrice is range-bound.\nMARKET_SIGNAL: neutral",
  "On-Chain Analyst": "FINAL_REPORT:\nNetwork activity is steady.\nONCHAIN_SIGNAL: neutral",
  "News Analyst": "FINAL_REPORT:\nNo major headlines.\nNEWS_SIGNAL: neutral",
  "Social Sentiment Analyst": "FINAL_REPORT:\nCommunity mood is calm.\nSENTIMENT_SIGNAL: neutral",
  "Bull Researcher": "Adoption keeps growing.",
  "Bear Researcher": "Valuation is stretched.",
  "Risky Analyst": "Upside justifies a full position.",
  "Safe Analyst": "Keep the position small.",
  "Neutral Analyst": "A moderate position balances both views.",
  "Research Manager":
    "RECOMMENDATION: BUY\nCONFIDENCE: 0.7\nRATIONALE: Momentum is strong.\nINVESTMENT_PLAN: Accumulate gradually.",
  Trader:
    "FINAL_ACTION: BUY\nCONFIDENCE: 0.8\nPOSITION_SIZE_PCT: 10\nRATIONALE: Follow the plan.\nFINAL TRANSACTION PROPOSAL: **BUY**",
  "Risk Manager": "FINAL_ACTION: BUY\nCONFIDENCE: 0.6\nRATIONALE: Risks acceptable.",
};

/** Answers by agent name from SCRIPT, with per-agent overrides */
export function scripted(overrides: Record<string, string | Error> = {}): ScriptedGenerator {
  return new ScriptedGenerator((_prompt, { agent }) => {
    const answer = overrides[agent] ?? SCRIPT[agent];
    if (answer instanceof Error) throw answer;
    if (answer === undefined) throw new Error(`no scripted answer for ${agent}`);
    return answer;
  });
}

// ── Fake capabilities ─────────────────────────────────────────

export type FakeHandler = (args: { symbol?: string }) => Promise<string>;

/** All registry names, answering `<name> data` unless overridden */
export function fakeCapabilities(overrides: Partial<Record<CapabilityName, FakeHandler>> = {}): Capability[] {
  return CAPABILITY_NAMES.map((name) =>
    defineCapability({
      name,
      description: `${name} (fake)`,
      args: { symbol: z.string().optional() },
      handler: (args) => overrides[name]?.(args) ?? Promise.resolve(`${name} data`),
    }),
  );
}

export function fakeInvoker(overrides: Partial<Record<CapabilityName, FakeHandler>> = {}): ToolInvoker {
  return new ToolInvoker(fakeCapabilities(overrides), { timeoutMs: 1_000 });
}

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");
export const fixedClock = () => FIXED_NOW;

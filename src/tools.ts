import { z, type ZodRawShape, type ZodTypeAny } from "zod";
import { withTimeout } from "./async.js";
import { ConfigurationError, TimeoutError, ToolFailure, errorMessage, type ToolFailureKind } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

// ── Capability registry ──────────────────────────────────────

export const CAPABILITY_NAMES = [
  "get_crypto_price_data",
  "get_global_crypto_market",
  "get_crypto_fear_greed_index",
  "get_trending_cryptocurrencies",
  "get_bitcoin_onchain_metrics",
  "get_ethereum_onchain_metrics",
  "get_onchain_metrics",
  "get_defi_chain_metrics",
  "get_crypto_news",
  "get_regulatory_news",
  "get_crypto_full_analysis",
] as const;

export type CapabilityName = (typeof CAPABILITY_NAMES)[number];

export function isCapabilityName(name: string): name is CapabilityName {
  return CAPABILITY_NAMES.some((known) => known === name);
}

export interface CapabilityContext {
  signal: AbortSignal;
}

/** A registered data capability. `run` validates raw arguments before calling out. */
export interface Capability {
  readonly name: CapabilityName;
  readonly description: string;
  readonly args: ZodRawShape;
  run(rawArgs: unknown, ctx: CapabilityContext): Promise<string>;
}

export function defineCapability<S extends ZodRawShape>(def: {
  name: CapabilityName;
  description: string;
  args: S;
  handler: (args: z.infer<z.ZodObject<S>>, ctx: CapabilityContext) => Promise<string>;
}): Capability {
  const schema = z.object(def.args);
  return {
    name: def.name,
    description: def.description,
    args: def.args,
    async run(rawArgs, ctx) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join(".") || "(args)"}: ${i.message}`)
          .join("; ");
        throw new ToolFailure("permanent", `invalid arguments for ${def.name}: ${issues}`);
      }
      return def.handler(parsed.data, ctx);
    },
  };
}

/**
 * Every known name registered exactly once, with a description, and every
 * name in `required` present.
 */
export function validateRegistry(
  capabilities: readonly Capability[],
  required: Iterable<string> = CAPABILITY_NAMES,
): void {
  const issues: string[] = [];
  const seen = new Set<string>();
  for (const cap of capabilities) {
    if (seen.has(cap.name)) issues.push(`${cap.name}: registered more than once`);
    seen.add(cap.name);
    if (cap.description.trim().length === 0) issues.push(`${cap.name}: missing description`);
  }
  for (const name of required) {
    if (!seen.has(name)) issues.push(`${name}: not registered`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid capability registry", issues);
  }
}

// ── Invocation ───────────────────────────────────────────────

/** A model's request for one capability */
export interface ToolCall {
  capability: string;
  /** Parsed JSON arguments, or the raw text when it was not valid JSON */
  args: unknown;
}

export type ToolResult =
  | { ok: true; capability: string; text: string }
  | {
      ok: false;
      capability: string;
      failure: "unknown_capability" | ToolFailureKind;
      message: string;
    };

export interface ToolInvokerOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class ToolInvoker {
  private readonly registry = new Map<string, Capability>();
  private readonly logger: Logger;

  constructor(
    readonly capabilities: readonly Capability[],
    private readonly options: ToolInvokerOptions,
  ) {
    for (const cap of capabilities) {
      if (!this.registry.has(cap.name)) this.registry.set(cap.name, cap);
    }
    this.logger = options.logger ?? silentLogger;
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  validate(required?: Iterable<string>): void {
    validateRegistry(this.capabilities, required);
  }

  /** Never throws; every failure becomes a failed ToolResult. */
  async invoke(capability: string, args: unknown, signal?: AbortSignal): Promise<ToolResult> {
    const cap = this.registry.get(capability);
    if (!cap) {
      this.logger.warn(`unknown capability requested: ${capability}`);
      return {
        ok: false,
        capability,
        failure: "unknown_capability",
        message: `Unknown capability: ${capability}`,
      };
    }

    try {
      const text = await withTimeout(
        (taskSignal) => cap.run(args, { signal: taskSignal }),
        this.options.timeoutMs,
        { parent: signal, what: `tool ${capability}` },
      );
      this.logger.debug(`${capability} ok (${text.length} chars)`);
      return { ok: true, capability, text };
    } catch (err: unknown) {
      const failure: ToolFailureKind = err instanceof ToolFailure ? err.kind : "transient";
      const message = err instanceof TimeoutError ? err.message : errorMessage(err);
      this.logger.warn(`${capability} failed (${failure}): ${message}`);
      return { ok: false, capability, failure, message };
    }
  }

  /** Model-facing tool list for the given names, in the order given */
  describeTools(names: readonly string[]): string {
    return names
      .flatMap((name) => {
        const cap = this.registry.get(name);
        return cap ? [describeCapability(cap)] : [];
      })
      .join("\n");
  }
}

export function describeCapability(cap: Capability): string {
  const args = Object.entries(cap.args).map(([name, schema]) => describeArg(name, schema));
  const lines = [`- ${cap.name}: ${cap.description}`];
  lines.push(args.length > 0 ? `    args: ${args.join("; ")}` : "    args: none");
  return lines.join("\n");
}

function describeArg(name: string, schema: ZodTypeAny): string {
  const description = schema.description;
  let inner = schema;
  let optional = false;
  if (inner instanceof z.ZodDefault) {
    optional = true;
    inner = inner.removeDefault();
  }
  if (inner instanceof z.ZodOptional) {
    optional = true;
    inner = inner.unwrap();
  }
  const doc = description ?? inner.description;
  const type = argTypeName(inner);
  return `${name} (${type}${optional ? ", optional" : ""})${doc ? ` - ${doc}` : ""}`;
}

function argTypeName(schema: ZodTypeAny): string {
  if (schema instanceof z.ZodString) return "string";
  if (schema instanceof z.ZodNumber) return "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (schema instanceof z.ZodEnum) return schema.options.join("|");
  return "value";
}

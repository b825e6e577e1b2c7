import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import type { z } from "zod";
import { CONFIG_FILE } from "./paths.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { tradingConfigSchema, type TradingConfig } from "./types.js";

/** Raw option values from flags; validated together with the file values */
export type ConfigOverrides = { [K in keyof z.input<typeof tradingConfigSchema>]?: unknown };

/** Optional data-source keys; missing ones only limit what the analysts can fetch */
const OPTIONAL_KEYS: Array<{ env: string; effect: string }> = [
  { env: "COINGECKO_API_KEY", effect: "CoinGecko public tier in use (lower rate limits)" },
  { env: "ETHERSCAN_API_KEY", effect: "Ethereum on-chain metrics unavailable" },
  { env: "CRYPTOCOMPARE_API_KEY", effect: "generic on-chain metrics unavailable" },
  { env: "CRYPTOPANIC_API_KEY", effect: "crypto news and regulatory news unavailable" },
];

/**
 * Validate raw options, apply defaults and freeze the result.
 * The returned object is shared read-only for the whole run.
 */
export function resolveConfig(raw: unknown): TradingConfig {
  const parsed = tradingConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
    );
    throw new ConfigurationError("Invalid configuration", issues);
  }
  return deepFreeze(parsed.data);
}

/**
 * Load the YAML config file, merge command-line overrides over it and resolve.
 * A missing file means "all defaults"; an unreadable or malformed one is fatal.
 */
export async function loadTradingConfig(
  filePath: string = CONFIG_FILE,
  overrides: ConfigOverrides = {},
): Promise<TradingConfig> {
  let text: string | null = null;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw new ConfigurationError(`Cannot read config file ${filePath}`, [errorMessage(err)]);
    }
  }

  let fromFile: Record<string, unknown> = {};
  if (text !== null) {
    let loaded: unknown;
    try {
      loaded = yaml.load(text);
    } catch (err: unknown) {
      throw new ConfigurationError(`Invalid YAML in ${filePath}`, [errorMessage(err)]);
    }
    if (loaded !== undefined && loaded !== null) {
      if (typeof loaded !== "object" || Array.isArray(loaded)) {
        throw new ConfigurationError(`Config file ${filePath} must contain a mapping of options`);
      }
      fromFile = { ...loaded };
    }
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined),
  );
  return resolveConfig({ ...fromFile, ...defined });
}

/** Warnings for optional data-source keys that are not set */
export function configWarnings(env: NodeJS.ProcessEnv = process.env): string[] {
  return OPTIONAL_KEYS.filter((k) => !env[k.env]).map((k) => `${k.env} not set: ${k.effect}`);
}

/** Human-readable configuration summary */
export function describeConfig(config: TradingConfig): string[] {
  const policy = config.risk_policy;
  return [
    `Pipeline variant: ${config.pipeline_variant}`,
    `Analysts: ${config.enabled_analysts.join(", ")}`,
    `Supported tokens: ${config.supported_tokens.join(", ")}`,
    `Online tools: ${config.online_tools ? "enabled" : "disabled (offline synthesis)"}`,
    `Research debate rounds: ${config.max_debate_rounds}`,
    `Risk debate rounds: ${config.max_risk_discuss_rounds}`,
    `Memory reflections per turn: ${config.memory_top_k}`,
    `Tool calls per report: ${config.max_tool_calls_per_report}`,
    `Models: quick=${config.quick_think_model}, deep=${config.deep_think_model}`,
    `Risk override: ${policy.downgrade_from.join("/")} -> ${policy.downgrade_to} on ` +
      `[${policy.downgrade_keywords.join(", ")}]` +
      (policy.hold_on_insufficient_evidence ? "; HOLD on insufficient evidence" : ""),
    `Liquidity floor: ${policy.min_liquidity_24h_usd > 0 ? `$${policy.min_liquidity_24h_usd.toLocaleString("en-US")} 24h volume` : "off"}`,
    `Max position size: ${config.max_position_size_pct}%`,
    `Risk manager fallback: ${config.risk_manager_fallback}`,
  ];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

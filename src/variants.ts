import { ConfigurationError } from "./errors.js";
import { ANALYST_DEFINITIONS, type AnalystDefinition } from "./analysts.js";
import type { CapabilityName } from "./tools.js";
import { ANALYST_KINDS, type AnalystKind, type PipelineVariantId, type TradingConfig } from "./types.js";

export interface PipelineVariant {
  id: PipelineVariantId;
  description: string;
  analysts: readonly AnalystKind[];
  /** Tools added on top of each analyst's base toolset */
  extraTools: Partial<Record<AnalystKind, readonly CapabilityName[]>>;
}

export const PIPELINE_VARIANTS: Readonly<Record<PipelineVariantId, PipelineVariant>> = {
  crypto: {
    id: "crypto",
    description: "Market, on-chain, news and social analysts over spot market data",
    analysts: ANALYST_KINDS,
    extraTools: {},
  },
  crypto_defi: {
    id: "crypto_defi",
    description: "As crypto, with DeFi chain metrics (TVL) added to the on-chain analyst",
    analysts: ANALYST_KINDS,
    extraTools: { onchain: ["get_defi_chain_metrics"] },
  },
};

export function resolveVariant(config: TradingConfig): PipelineVariant {
  const variant = PIPELINE_VARIANTS[config.pipeline_variant];
  const unsupported = config.enabled_analysts.filter((kind) => !variant.analysts.includes(kind));
  if (unsupported.length > 0) {
    throw new ConfigurationError(
      `Analysts not available in the '${variant.id}' pipeline`,
      unsupported.map((kind) => `enabled_analysts: ${kind}`),
    );
  }
  return variant;
}

/** Full toolset an analyst may use for `asset` in this variant */
export function toolsForAnalyst(variant: PipelineVariant, definition: AnalystDefinition, asset: string): CapabilityName[] {
  const tools = [...definition.tools(asset), ...(variant.extraTools[definition.kind] ?? [])];
  return [...new Set(tools)];
}

/** Every tool any analyst could request, across supported assets */
export function requiredTools(variant: PipelineVariant, assets: readonly string[]): Set<CapabilityName> {
  const required = new Set<CapabilityName>();
  for (const kind of variant.analysts) {
    for (const asset of assets) {
      for (const tool of toolsForAnalyst(variant, ANALYST_DEFINITIONS[kind], asset)) required.add(tool);
    }
  }
  return required;
}

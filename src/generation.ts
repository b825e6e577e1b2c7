import { withTimeout } from "./async.js";
import { SynthesisFailure, errorMessage } from "./errors.js";

export type ModelTier = "quick" | "deep";

export interface GenerationContext {
  /** Agent asking for text, used in logs and errors */
  agent: string;
  tier: ModelTier;
  system?: string;
  signal?: AbortSignal;
}

/** Language-model seam: prompt in, text out */
export interface Generator {
  generate(prompt: string, context: GenerationContext): Promise<string>;
}

/**
 * Generate with a per-call timeout. Any failure, including empty output,
 * surfaces as SynthesisFailure for the calling agent.
 */
export async function generateWithin(
  generator: Generator,
  prompt: string,
  context: GenerationContext,
  timeoutMs: number,
): Promise<string> {
  let text: string;
  try {
    text = await withTimeout(
      (signal) => generator.generate(prompt, { ...context, signal }),
      timeoutMs,
      { parent: context.signal, what: `${context.agent} generation` },
    );
  } catch (err: unknown) {
    throw new SynthesisFailure(context.agent, errorMessage(err), { cause: err });
  }
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new SynthesisFailure(context.agent, "empty output");
  }
  return trimmed;
}

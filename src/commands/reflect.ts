import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { loadTradingConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { CONFIG_FILE } from "../paths.js";
import { reflectAndRemember } from "../reflection.js";
import { loadRunResult } from "../report.js";
import { createRuntime } from "../runtime.js";
import { runOutcomeSchema, type RunOutcome } from "../types.js";

export function parseOutcome(label: string, returns?: string): RunOutcome {
  const parsed = runOutcomeSchema.safeParse({
    label,
    ...(returns !== undefined ? { returns_pct: Number(returns) } : {}),
  });
  if (!parsed.success || (parsed.data.returns_pct !== undefined && !Number.isFinite(parsed.data.returns_pct))) {
    throw new Error(`Invalid outcome '${label}'${returns !== undefined ? ` with returns '${returns}'` : ""}`);
  }
  return parsed.data;
}

export const reflectCommand = new Command("reflect")
  .description("Record reflections for a saved run once its outcome is known")
  .argument("<run>", "Saved run trace (.json)")
  .argument("<outcome>", "Outcome label (e.g. profit, loss, flat)")
  .option("--returns <pct>", "Realized return in percent")
  .option("-c, --config <file>", "Config file", CONFIG_FILE)
  .action(async (runFile: string, label: string, opts: { returns?: string; config: string }) => {
    const spinner = ora(`Reflecting on ${runFile}...`).start();
    try {
      const outcome = parseOutcome(label, opts.returns);
      const state = await loadRunResult(runFile);
      if (state.memory_candidates.length === 0) {
        spinner.warn(`No decisions to reflect on in ${runFile} (stage: ${state.stage}).`);
        return;
      }

      const config = await loadTradingConfig(opts.config);
      const runtime = await createRuntime(config);
      const records = await reflectAndRemember(state, outcome, {
        generator: runtime.generator,
        memory: runtime.memory,
        generationTimeoutMs: config.generation_timeout_ms,
        memoryFile: runtime.memoryFile,
        logger: runtime.logger.child("reflection"),
      });
      await runtime.logger.flush();

      spinner.succeed(`Stored ${records.length} reflection(s); memory now holds ${runtime.memory.size}.`);
      for (const record of records) {
        console.log(chalk.dim(`  ${record.source ?? "unknown"}: ${record.reflection.split("\n")[0]}`));
      }
    } catch (err: unknown) {
      process.exitCode = 1;
      spinner.fail(`Reflection failed: ${errorMessage(err)}`);
    }
  });

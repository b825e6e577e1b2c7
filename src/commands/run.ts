import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { configWarnings, loadTradingConfig, type ConfigOverrides } from "../config.js";
import { ConfigurationError, PipelineAbortedError, errorMessage } from "../errors.js";
import { createGraph, createRuntime } from "../runtime.js";
import { saveRunResult } from "../report.js";
import { CONFIG_FILE } from "../paths.js";
import { orderedReports } from "../debate.js";
import type { PipelineStage, TradingState, Verdict } from "../types.js";

export interface RunCommandOptions {
  config: string;
  rounds?: string;
  riskRounds?: string;
  analysts?: string;
  offline?: boolean;
  variant?: string;
  model?: string;
  verbose?: boolean;
}

const STAGE_LABELS: Partial<Record<PipelineStage, string>> = {
  collecting_analysts: "Stage 1/5: Running analyst team",
  research_debate: "Stage 2/5: Bull/bear research debate",
  trader_decision: "Stage 3/5: Trader proposal",
  risk_debate: "Stage 4/5: Risk debate",
  final_decision: "Stage 5/5: Risk manager decision",
};

/** Flag values as config overrides; undefined means "keep the file value" */
export function runOverrides(opts: RunCommandOptions): ConfigOverrides {
  return {
    max_debate_rounds: opts.rounds !== undefined ? Number(opts.rounds) : undefined,
    max_risk_discuss_rounds: opts.riskRounds !== undefined ? Number(opts.riskRounds) : undefined,
    enabled_analysts: opts.analysts
      ?.split(",")
      .map((a) => a.trim())
      .filter((a) => a.length > 0),
    online_tools: opts.offline ? false : undefined,
    pipeline_variant: opts.variant,
    deep_think_model: opts.model,
  };
}

export function colorVerdict(verdict: Verdict): string {
  if (verdict === "BUY") return chalk.green.bold(verdict);
  if (verdict === "SELL") return chalk.red.bold(verdict);
  return chalk.yellow.bold(verdict);
}

function printSummary(state: TradingState): void {
  const final = state.final_decision;
  if (!final) return;

  console.log(`  Final Decision: ${colorVerdict(final.verdict)} ${state.asset} (${(final.confidence * 100).toFixed(0)}%)`);
  if (state.trader_decision?.position_size_pct !== undefined) {
    console.log(`  Position Size: ${state.trader_decision.position_size_pct}%`);
  }
  if (final.overridden) {
    console.log(chalk.yellow(`  Override: trader proposed ${final.trader_verdict} (${final.override_reason ?? "risk manager"})`));
  }
  console.log();

  const reports = orderedReports(state.analyst_reports);
  const withData = reports.filter((r) => r.data_available).length;
  console.log(
    chalk.dim(
      `  Analysts: ${reports.length} reports, ${withData} with live data | ` +
        `Research debate: ${state.research_debate.rounds_completed} round(s) | ` +
        `Risk debate: ${state.risk_debate.rounds_completed} round(s)`,
    ),
  );
}

export const runCommand = new Command("run")
  .description("Run the multi-agent pipeline for one asset and trade date")
  .argument("<asset>", "Crypto symbol (e.g. BTC, ETH)")
  .argument("[date]", "Trade date, YYYY-MM-DD (default: today)")
  .option("-c, --config <file>", "Config file", CONFIG_FILE)
  .option("-r, --rounds <n>", "Research debate rounds")
  .option("--risk-rounds <n>", "Risk debate rounds")
  .option("-a, --analysts <list>", "Comma-separated analysts (market,onchain,news,social)")
  .option("--offline", "Run without live data tools")
  .option("--variant <id>", "Pipeline variant (crypto, crypto_defi)")
  .option("-m, --model <model>", "Deep-thinking model override")
  .option("-v, --verbose", "Echo log lines to stderr")
  .action(async (asset: string, date: string | undefined, opts: RunCommandOptions) => {
    const tradeDate = date ?? new Date().toISOString().split("T")[0];
    const spinner = ora(`Preparing ${asset.toUpperCase()} ${tradeDate}...`).start();

    const controller = new AbortController();
    const onInterrupt = () => {
      spinner.text = "Cancelling after the current step...";
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    let flush: () => Promise<void> = async () => {};
    try {
      const config = await loadTradingConfig(opts.config, runOverrides(opts));
      const runtime = await createRuntime(config, { verbose: opts.verbose });
      flush = () => runtime.logger.flush();
      for (const warning of configWarnings()) runtime.logger.warn(warning);

      const graph = createGraph(runtime);
      const result = await graph.run(asset, tradeDate, {
        signal: controller.signal,
        onStage: (stage) => {
          const label = STAGE_LABELS[stage];
          if (label) spinner.text = `${label}...`;
        },
      });

      spinner.succeed(`Pipeline complete for ${result.state.asset} on ${tradeDate}.`);
      console.log();
      printSummary(result.state);

      const saved = await saveRunResult(result.state);
      console.log(chalk.dim(`  Report saved: ${saved.markdownPath}`));
      console.log(chalk.dim(`  Trace saved: ${saved.jsonPath}`));
    } catch (err: unknown) {
      process.exitCode = 1;
      if (err instanceof PipelineAbortedError) {
        spinner.fail(`Pipeline aborted during ${err.stage}: ${err.reason}`);
        try {
          const saved = await saveRunResult(err.state);
          console.log(chalk.dim(`  Partial trace saved: ${saved.jsonPath}`));
        } catch (saveErr: unknown) {
          console.error(chalk.red(`  Could not save partial trace: ${errorMessage(saveErr)}`));
        }
      } else if (err instanceof ConfigurationError) {
        spinner.fail(chalk.red(err.message));
      } else {
        spinner.fail(`Pipeline failed: ${errorMessage(err)}`);
      }
    } finally {
      process.removeListener("SIGINT", onInterrupt);
      await flush();
    }
  });

import { Command } from "commander";
import chalk from "chalk";
import { configWarnings, describeConfig, loadTradingConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { CONFIG_FILE } from "../paths.js";

export const configCommand = new Command("config")
  .description("Show the resolved configuration and missing data-source keys")
  .option("-c, --config <file>", "Config file", CONFIG_FILE)
  .action(async (opts: { config: string }) => {
    try {
      const config = await loadTradingConfig(opts.config);
      console.log(chalk.bold(`Configuration (${opts.config})`));
      for (const line of describeConfig(config)) console.log(`  ${line}`);

      const warnings = configWarnings();
      if (warnings.length > 0) {
        console.log();
        for (const warning of warnings) console.log(chalk.yellow(`  ! ${warning}`));
      }
    } catch (err: unknown) {
      process.exitCode = 1;
      console.error(chalk.red(errorMessage(err)));
    }
  });

import { Command } from "commander";
import chalk from "chalk";
import { defaultCapabilities } from "../capabilities.js";
import { describeCapability } from "../tools.js";

export const toolsCommand = new Command("tools")
  .description("List the data capabilities available to analysts")
  .action(() => {
    const capabilities = defaultCapabilities();
    console.log(chalk.bold(`${capabilities.length} capabilities`));
    console.log();
    for (const cap of capabilities) {
      console.log(describeCapability(cap));
    }
  });

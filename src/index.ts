#!/usr/bin/env node
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { reflectCommand } from "./commands/reflect.js";
import { toolsCommand } from "./commands/tools.js";
import { configCommand } from "./commands/config.js";

const program = new Command()
  .name("tradegraph")
  .version("0.1.0")
  .description("Multi-agent crypto trading recommendations powered by the Claude Agent SDK");

program.addCommand(runCommand);
program.addCommand(reflectCommand);
program.addCommand(toolsCommand);
program.addCommand(configCommand);

await program.parseAsync();

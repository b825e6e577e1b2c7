import { AgentSdkGenerator } from "./agent.js";
import { createDefaultInvoker } from "./capabilities.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";
import { MemoryStore } from "./memory.js";
import { LOG_FILE, MEMORY_FILE } from "./paths.js";
import { TradingGraph } from "./graph.js";
import type { Generator } from "./generation.js";
import type { ToolInvoker } from "./tools.js";
import type { TradingConfig } from "./types.js";

export interface Runtime {
  config: TradingConfig;
  logger: Logger;
  generator: Generator;
  invoker: ToolInvoker;
  memory: MemoryStore;
  memoryFile: string;
}

export interface RuntimeOptions {
  memoryFile?: string;
  logFile?: string;
  /** Echo log lines to stderr */
  verbose?: boolean;
}

/** Production collaborators: live data tools, Agent SDK models, on-disk memory */
export async function createRuntime(config: TradingConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const level: LogLevel = options.verbose ? "debug" : "info";
  const logger = createLogger({ file: options.logFile ?? LOG_FILE, console: options.verbose ?? false, level });
  const memoryFile = options.memoryFile ?? MEMORY_FILE;

  return {
    config,
    logger,
    generator: new AgentSdkGenerator({
      models: { quick: config.quick_think_model, deep: config.deep_think_model },
      logger: logger.child("agent"),
    }),
    invoker: createDefaultInvoker({ timeoutMs: config.tool_timeout_ms, logger: logger.child("tools") }),
    memory: await MemoryStore.load(memoryFile),
    memoryFile,
  };
}

export function createGraph(runtime: Runtime): TradingGraph {
  return new TradingGraph(runtime.config, {
    generator: runtime.generator,
    invoker: runtime.invoker,
    memory: runtime.memory,
    logger: runtime.logger,
  });
}

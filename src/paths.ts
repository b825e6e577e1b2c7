import { homedir } from "node:os";
import { join } from "node:path";

/** Root of all on-disk state; override with TRADEGRAPH_HOME */
export const WORKSPACE = process.env.TRADEGRAPH_HOME ?? join(homedir(), ".tradegraph");

export const CONFIG_FILE = join(WORKSPACE, "config.yaml");
export const MEMORY_FILE = join(WORKSPACE, "memory.json");
export const RUNS_DIR = join(WORKSPACE, "runs");
export const LOG_FILE = join(WORKSPACE, "tradegraph.log");

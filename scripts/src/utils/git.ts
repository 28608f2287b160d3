import { GIT_TIMEOUT_MS } from "../constants.js";
import { exec as defaultExec } from "./exec.js";
import type { CommandExecutor } from "./exec.js";
import { logger } from "./logger.js";

async function revParse(args: string[], exec: CommandExecutor): Promise<string | null> {
  try {
    const { stdout } = await exec("git", ["rev-parse", ...args], { timeoutMs: GIT_TIMEOUT_MS });
    const value = stdout.trim();
    return value.length > 0 ? value : null;
  } catch (error) {
    logger.debug("Unable to read git metadata", { args, error: String(error) });
    return null;
  }
}

export async function currentCommit(exec: CommandExecutor = defaultExec): Promise<string | null> {
  return revParse(["HEAD"], exec);
}

export async function currentBranch(exec: CommandExecutor = defaultExec): Promise<string | null> {
  return revParse(["--abbrev-ref", "HEAD"], exec);
}

/**
 * Command Runner
 * Runs the external training tools and appends their output to the log
 */

import { spawn } from "node:child_process";
import { delimiter, join, resolve } from "node:path";
import { isExecutable } from "./fs";
import { ToolExecutionFailedError, ToolNotFoundError } from "./errors";
import type { Logger } from "./logger";

// Tools are looked up as-is first, then inside these build subdirectories
export const TOOL_SEARCH_PREFIXES = ["", "api/", "training/"] as const;

export interface RunOptions {
  // Full environment of the child; inherits the current one when omitted
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /**
   * Run a tool by logical name; resolves on exit code 0, rejects otherwise
   */
  run(tool: string, args: readonly string[], options?: RunOptions): Promise<void>;
}

export interface ToolLookupOptions {
  // Executable search path, defaults to $PATH
  path?: string;
  // Base for names with a directory part, defaults to the working directory
  cwd?: string;
}

export interface ResolvedTool {
  // Name as it was found (e.g. "training/text2image")
  command: string;
  // Absolute path to spawn
  executable: string;
}

interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: Buffer;
}

/**
 * Locate a command on the search path
 * Names with a directory part are checked directly, relative to `cwd`
 *
 * @returns Absolute path of the executable, or null when it cannot be found
 */
export async function which(
  command: string,
  options: ToolLookupOptions = {},
): Promise<string | null> {
  if (command.includes("/")) {
    const candidate = resolve(options.cwd ?? process.cwd(), command);
    return (await isExecutable(candidate)) ? candidate : null;
  }

  const searchPath = options.path ?? process.env.PATH ?? "";
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Resolve a logical tool name against TOOL_SEARCH_PREFIXES, first match wins
 *
 * @throws ToolNotFoundError when no prefix resolves
 */
export async function resolveTool(
  tool: string,
  options: ToolLookupOptions = {},
): Promise<ResolvedTool> {
  for (const prefix of TOOL_SEARCH_PREFIXES) {
    const command = `${prefix}${tool}`;
    const executable = await which(command, options);
    if (executable) {
      return { command, executable };
    }
  }
  throw new ToolNotFoundError(tool);
}

function execute(
  executable: string,
  args: readonly string[],
  env: NodeJS.ProcessEnv | undefined,
): Promise<ProcessResult> {
  return new Promise((resolvePromise, reject) => {
    const child = spawn(executable, [...args], {
      env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    // stdout and stderr share one buffer, in arrival order
    const chunks: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => chunks.push(chunk));

    child.once("error", reject);
    child.once("close", (exitCode, signal) => {
      resolvePromise({ exitCode, signal, output: Buffer.concat(chunks) });
    });
  });
}

function decodeOutput(output: Buffer): { text: string } | { error: unknown } {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(output) };
  } catch (error) {
    return { error };
  }
}

/**
 * Runs tools as child processes
 */
export class ProcessCommandRunner implements CommandRunner {
  private tools = new Map<string, Promise<ResolvedTool>>();

  constructor(
    private logger: Logger,
    private lookup: ToolLookupOptions = {},
  ) {}

  async run(
    tool: string,
    args: readonly string[],
    options: RunOptions = {},
  ): Promise<void> {
    const { command, executable } = await this.resolve(tool);

    this.logger.debug(`Running ${command}`);
    for (const arg of args) {
      this.logger.debug(arg);
    }

    let result: ProcessResult;
    try {
      result = await execute(executable, args, options.env);
    } catch (error) {
      this.logger.child(command).error(`Could not start ${executable}`, error);
      throw new ToolExecutionFailedError(command, null, "", { cause: error });
    }

    const toolLogger = this.logger.child(command);
    const decoded = decodeOutput(result.output);
    const text = "text" in decoded ? decoded.text : "";

    if (result.exitCode === 0) {
      if (text) toolLogger.debug(text);
      return;
    }

    if ("text" in decoded) {
      toolLogger.error(decoded.text);
    } else {
      toolLogger.error("Could not decode tool output", decoded.error);
    }
    throw new ToolExecutionFailedError(command, result.exitCode, text, {
      signal: result.signal,
    });
  }

  private resolve(tool: string): Promise<ResolvedTool> {
    let resolved = this.tools.get(tool);
    if (!resolved) {
      resolved = resolveTool(tool, this.lookup);
      this.tools.set(tool, resolved);
    }
    return resolved;
  }
}

/**
 * Fake Command Runner
 * In-process stand-in for the training tools: writes the files each tool would write
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { ToolExecutionFailedError } from "../utils/errors";
import type { CommandRunner, RunOptions } from "../utils/run-command";

export interface RecordedCall {
  tool: string;
  args: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export interface FakeCommandRunnerOptions {
  // text2image fails (exit code 1) when rendering one of these fonts
  failFonts?: readonly string[];
  // Tools that fail on every call
  failTools?: readonly string[];
  // Milliseconds each call takes
  delay?: number;
}

/**
 * Value of "--name=value" or "--name value"
 */
export function argValue(args: readonly string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith(`${name}=`)) {
      return arg.slice(name.length + 1);
    }
    if (arg === name && i + 1 < args.length) {
      return args[i + 1];
    }
  }
  return undefined;
}

function requireArg(tool: string, args: readonly string[], name: string): string {
  const value = argValue(args, name);
  if (value === undefined) {
    throw new ToolExecutionFailedError(tool, 1, `missing ${name}`);
  }
  return value;
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private inFlight = new Map<string, number>();
  private peaks = new Map<string, number>();

  constructor(private options: FakeCommandRunnerOptions = {}) {}

  /**
   * Highest number of concurrent calls seen for a tool
   */
  maxConcurrency(tool: string): number {
    return this.peaks.get(tool) ?? 0;
  }

  callsTo(tool: string): RecordedCall[] {
    return this.calls.filter((call) => call.tool === tool);
  }

  async run(tool: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    this.calls.push({ tool, args: [...args], env: options.env });

    const current = (this.inFlight.get(tool) ?? 0) + 1;
    this.inFlight.set(tool, current);
    this.peaks.set(tool, Math.max(current, this.peaks.get(tool) ?? 0));

    try {
      if (this.options.delay) {
        await new Promise((resolve) => setTimeout(resolve, this.options.delay));
      }
      if (this.options.failTools?.includes(tool)) {
        throw new ToolExecutionFailedError(tool, 1, "simulated failure");
      }
      await this.simulate(tool, args);
    } finally {
      this.inFlight.set(tool, (this.inFlight.get(tool) ?? 1) - 1);
    }
  }

  private async simulate(tool: string, args: readonly string[]): Promise<void> {
    switch (tool) {
      case "text2image": {
        const outbase = requireArg(tool, args, "--outputbase");
        const font = argValue(args, "--font") ?? "";
        if (args.includes("--only_extract_font_properties")) {
          await writeFile(`${outbase}.fontinfo`, `${font} 0 0 0 0 0\n`);
          return;
        }
        if (this.options.failFonts?.includes(font)) {
          throw new ToolExecutionFailedError(tool, 1, `Could not find font named ${font}`);
        }
        await writeFile(`${outbase}.box`, "H 0 0 10 10 0\n");
        await writeFile(`${outbase}.tif`, "II*\0");
        return;
      }
      case "unicharset_extractor": {
        await writeFile(requireArg(tool, args, "--output_unicharset"), "3\nNULL 0\nH 5\n");
        return;
      }
      case "set_unicharset_properties": {
        await writeFile(requireArg(tool, args, "-X"), "Arial 22\n");
        return;
      }
      case "tesseract": {
        await writeFile(`${args[1]}.lstmf`, "features");
        return;
      }
      case "combine_lang_model": {
        const lang = requireArg(tool, args, "--lang");
        const dir = path.join(requireArg(tool, args, "--output_dir"), lang);
        await mkdir(dir, { recursive: true });
        await writeFile(path.join(dir, `${lang}.traineddata`), "traineddata");
        await writeFile(path.join(dir, `${lang}.unicharset`), "3\n");
        return;
      }
      default:
        throw new ToolExecutionFailedError(tool, 127, `${tool}: command not found`);
    }
  }
}

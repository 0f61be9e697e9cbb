import { Logger } from "@nestjs/common";
import { FadeResult, FrameGainRecord, GainStrategyKind } from "../fade/types";
import { CliCommand, FadeCommand, USAGE, UsageError, parseCliArgs } from "./cli-args";

export enum ExitCode {
  Success = 0,
  Failure = 1,
  Usage = 2,
}

export interface CliRuntime {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  execute: (command: FadeCommand) => Promise<FadeResult>;
}

const logger = new Logger("FadeCli");

/**
 * One line per window frame: `<frame index>: <gain> <gain> ...`
 */
export function formatGainReport(records: readonly FrameGainRecord[]): string {
  return records.map((record) => `${record.frameIndex}: ${record.before.join(" ")}\n`).join("");
}

/**
 * Parses the arguments and runs the command
 * @returns The process exit code
 */
export async function runFadeCli(argv: readonly string[], runtime: CliRuntime): Promise<ExitCode> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      runtime.stderr(`${error.message}\n\n${USAGE.trim()}\n`);
      return ExitCode.Usage;
    }
    throw error;
  }

  if (command.kind === "help") {
    runtime.stdout(`${USAGE.trim()}\n`);
    return ExitCode.Success;
  }

  try {
    const result = await runtime.execute(command);
    if (command.options.mode.kind === GainStrategyKind.Collect) {
      runtime.stdout(formatGainReport(result.records));
    }
    return ExitCode.Success;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return ExitCode.Failure;
  }
}

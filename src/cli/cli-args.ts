import { resolve } from "path";
import { FadeDirection, FadeOptions, GainMode, GainStrategyKind } from "../fade/types";

export const USAGE = `
mp3-fade [options] <input>

Fade an MP3 file in or out by rewriting the global gain of its Layer III frames.

Options:
  -o, --output <path>       Output file path (required)
  --in                      Fade in over the first frames
  --out                     Fade out over the last frames
  --frames <n>              Fade length in frames
  --rate <db>               Attenuation in dB added at each frame step
  --print-raw-gain          Print the global gains of the fade frames instead of changing them
  --set-raw-gain <n,n,...>  Set the global gain of each fade frame (0-255)
  -h, --help                Show this help

Exactly one of --in and --out is required. --frames and --rate are required
unless --set-raw-gain is given; --print-raw-gain needs only --frames.
`;

/**
 * Error thrown when the command line is incomplete or inconsistent
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UsageError);
    }
  }
}

export interface FadeCommand {
  kind: "fade";
  inputPath: string;
  outputPath: string;
  options: FadeOptions;
}

export type CliCommand = FadeCommand | { kind: "help" };

const VALUE_OPTIONS: ReadonlyMap<string, string> = new Map([
  ["-o", "output"],
  ["--output", "output"],
  ["--frames", "frames"],
  ["--rate", "rate"],
  ["--set-raw-gain", "set-raw-gain"],
]);

const FLAG_OPTIONS: ReadonlyMap<string, string> = new Map([
  ["--in", "in"],
  ["--out", "out"],
  ["--print-raw-gain", "print-raw-gain"],
  ["-h", "help"],
  ["--help", "help"],
]);

interface RawArgs {
  values: Record<string, string | undefined>;
  flags: Set<string>;
  positionals: string[];
}

function parseArgs(argv: readonly string[]): RawArgs {
  const args: RawArgs = { values: {}, flags: new Set(), positionals: [] };
  let i = 0;
  while (i < argv.length) {
    const token = argv[i];

    if (token === "--") {
      args.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!token.startsWith("-") || token === "-") {
      args.positionals.push(token);
      i += 1;
      continue;
    }

    const eq = token.indexOf("=");
    const name = eq === -1 ? token : token.slice(0, eq);
    const valueKey = VALUE_OPTIONS.get(name);
    const flagKey = FLAG_OPTIONS.get(name);

    if (valueKey) {
      const value = eq === -1 ? argv[i + 1] : token.slice(eq + 1);
      if (value === undefined) {
        throw new UsageError(`Missing value for ${name}`);
      }
      if (args.values[valueKey] !== undefined) {
        throw new UsageError(`${name} given more than once`);
      }
      args.values[valueKey] = value;
      i += eq === -1 ? 2 : 1;
    } else if (flagKey && eq === -1) {
      args.flags.add(flagKey);
      i += 1;
    } else {
      throw new UsageError(`Unknown option: ${token}`);
    }
  }
  return args;
}

function parseFrameCount(value: string): number {
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new UsageError(`--frames must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

function parseRate(value: string): number {
  const rate = Number(value);
  if (value.trim() === "" || !Number.isFinite(rate)) {
    throw new UsageError(`--rate must be a number, got "${value}"`);
  }
  return rate;
}

/**
 * Parses the explicit gain list. Range checks happen when the gains are applied.
 */
function parseGainList(value: string): number[] {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.some((part) => !/^-?\d+$/.test(part))) {
    throw new UsageError(`--set-raw-gain must be a comma-separated list of integers, got "${value}"`);
  }
  return parts.map(Number);
}

function parseDirection(flags: Set<string>): FadeDirection {
  const fadeIn = flags.has("in");
  const fadeOut = flags.has("out");
  if (fadeIn === fadeOut) {
    throw new UsageError("Exactly one of --in and --out is required");
  }
  return fadeIn ? FadeDirection.In : FadeDirection.Out;
}

function parseGainMode(args: RawArgs): GainMode {
  const { values, flags } = args;
  const explicit = values["set-raw-gain"];

  if (flags.has("print-raw-gain") && explicit !== undefined) {
    throw new UsageError("--print-raw-gain and --set-raw-gain cannot be combined");
  }

  if (explicit !== undefined) {
    if (values.rate !== undefined) {
      throw new UsageError("--rate cannot be combined with --set-raw-gain");
    }
    const gains = parseGainList(explicit);
    if (values.frames !== undefined && parseFrameCount(values.frames) !== gains.length) {
      throw new UsageError(
        `--frames (${values.frames}) does not match the ${gains.length} values of --set-raw-gain`,
      );
    }
    return { kind: GainStrategyKind.SetExplicit, values: gains };
  }

  if (values.frames === undefined) {
    throw new UsageError("Missing --frames");
  }
  const frames = parseFrameCount(values.frames);

  if (flags.has("print-raw-gain")) {
    return { kind: GainStrategyKind.Collect, frames };
  }

  if (values.rate === undefined) {
    throw new UsageError("Missing --rate");
  }
  return { kind: GainStrategyKind.AddDelta, frames, rate: parseRate(values.rate) };
}

/**
 * Parses command line arguments (without the node and script paths)
 * @throws UsageError if a required option is missing or options conflict
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const args = parseArgs(argv);
  if (args.flags.has("help")) {
    return { kind: "help" };
  }

  const direction = parseDirection(args.flags);
  const mode = parseGainMode(args);

  const outputPath = args.values.output;
  if (!outputPath) {
    throw new UsageError("Missing --output");
  }
  if (args.positionals.length !== 1) {
    throw new UsageError(
      args.positionals.length === 0 ? "Missing input file" : "Only one input file can be given",
    );
  }

  const inputPath = args.positionals[0];
  if (resolve(inputPath) === resolve(outputPath)) {
    throw new UsageError("Input and output must be different files");
  }

  return {
    kind: "fade",
    inputPath,
    outputPath,
    options: { direction, mode },
  };
}

import { parseArgs } from "util";
import { InvalidOptionError } from "../src";
import { BenchmarkConfig, Metric } from "./harness";

// Keep below 10! (3,628,800): keys are permutations of ten letters.
export const KEY_COUNT = 1_000_000;
export const CHAINING_LOAD_FACTORS = [0.6, 0.7, 0.8, 0.9, 1.0, 1.1, 1.2];
export const LINEAR_LOAD_FACTORS = [0.6, 0.65, 0.7, 0.75, 0.8, 0.85];
export const QUADRATIC_LOAD_FACTORS = [0.6, 0.65, 0.7, 0.75, 0.8, 0.85];

export const USAGE = `Run benchmarks on the hash table implementations.

Options:
  --name <name>                 Prefix for the output files (default: example)
  -N, --keys <n>                Number of keys to benchmark with (default: ${KEY_COUNT})
  -r, --repetitions <n>         Repeat each experiment to lower variance (default: 1)
  --chainingLoadFactor <lf>     Chaining max load factors, repeatable or comma-separated (must be > 0)
  --linearLoadFactor <lf>       Linear probing max load factors (must be < 1.0)
  --quadraticLoadFactor <lf>    Quadratic probing max load factors (must be < 1.0)
  --duplicates                  Resample keys with replacement
  --noPlotInsert                Do not write insert times
  --noPlotLookup                Do not write lookup times
  --noPlotMemory                Do not write memory usage
  --noPlotDelete                Do not write delete times
  --errorBars                   Include standard deviations
  --out <dir>                   Output directory (default: plots)
  -v, --verbose                 Repeat for more output
  -h, --help                    Show this message`;

export interface CliOptions extends BenchmarkConfig {
  help: boolean;
}

function toNumber(option: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidOptionError(option, `expected a number, got '${raw}'`);
  }
  return value;
}

function toPositiveInt(option: string, raw: string): number {
  const value = toNumber(option, raw);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidOptionError(option, `expected a positive integer, got '${raw}'`);
  }
  return value;
}

// Open-addressing tables need a bound below 1.0; chaining only needs one above 0.
function toLoadFactors(
  option: string,
  raw: string[] | undefined,
  fallback: number[],
  belowOne = false,
): number[] {
  if (!raw) return fallback;
  return raw
    .flatMap((item) => item.split(","))
    .map((item) => {
      const value = toNumber(option, item);
      if (value <= 0 || (belowOne && value >= 1)) {
        const range = belowOne ? "between 0 and 1 (exclusive)" : "greater than 0";
        throw new InvalidOptionError(option, `expected a load factor ${range}, got '${item}'`);
      }
      return value;
    });
}

/**
 * Turns command-line arguments (without the node and script entries) into a
 * benchmark configuration.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      name: { type: "string" },
      keys: { type: "string", short: "N" },
      repetitions: { type: "string", short: "r" },
      chainingLoadFactor: { type: "string", multiple: true },
      linearLoadFactor: { type: "string", multiple: true },
      quadraticLoadFactor: { type: "string", multiple: true },
      duplicates: { type: "boolean" },
      noPlotInsert: { type: "boolean" },
      noPlotLookup: { type: "boolean" },
      noPlotMemory: { type: "boolean" },
      noPlotDelete: { type: "boolean" },
      errorBars: { type: "boolean" },
      out: { type: "string" },
      verbose: { type: "boolean", short: "v", multiple: true },
      help: { type: "boolean", short: "h" },
    },
  });

  const plots: Metric[] = [];
  if (!values.noPlotInsert) plots.push("insert");
  if (!values.noPlotLookup) plots.push("lookup");
  if (!values.noPlotMemory) plots.push("memory");
  if (!values.noPlotDelete) plots.push("delete");

  return {
    name: values.name ?? "example",
    n: values.keys === undefined ? KEY_COUNT : toPositiveInt("N", values.keys),
    repeats:
      values.repetitions === undefined ? 1 : toPositiveInt("repetitions", values.repetitions),
    loadFactors: {
      ChainingHashTable: toLoadFactors(
        "chainingLoadFactor",
        values.chainingLoadFactor,
        CHAINING_LOAD_FACTORS,
      ),
      LinearProbingHashTable: toLoadFactors(
        "linearLoadFactor",
        values.linearLoadFactor,
        LINEAR_LOAD_FACTORS,
        true,
      ),
      QuadraticProbingHashTable: toLoadFactors(
        "quadraticLoadFactor",
        values.quadraticLoadFactor,
        QUADRATIC_LOAD_FACTORS,
        true,
      ),
    },
    duplicates: values.duplicates ?? false,
    plots,
    errorBars: values.errorBars ?? false,
    verbose: values.verbose?.length ?? 0,
    outDir: values.out ?? "plots",
    help: values.help ?? false,
  };
}

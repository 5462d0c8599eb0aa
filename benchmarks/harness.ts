import * as fs from "fs";
import * as path from "path";
import {
  ChainingHashTable,
  deepSizeOf,
  HashTableOptions,
  InvalidOptionError,
  LinearProbingHashTable,
  QuadraticProbingHashTable,
} from "../src";

const KEY_ALPHABET = "abcdefghij";
const MAX_KEYS = 3_628_800; // 10!

export type TableVariant =
  | "ChainingHashTable"
  | "LinearProbingHashTable"
  | "QuadraticProbingHashTable";

export type Variant = TableVariant | "Map";

export type Metric = "insert" | "lookup" | "memory" | "delete";

export const METRICS: readonly Metric[] = ["insert", "lookup", "memory", "delete"];

/**
 * The part of a map the benchmark drives. Both the hash tables and the
 * native `Map` fit it.
 */
export interface BenchmarkTarget<K, V> {
  set(key: K, value: V): unknown;
  get(key: K): V | undefined;
  delete(key: K): unknown;
}

export interface BenchmarkResult {
  insertMs: number;
  lookupMs: number;
  memoryMB: number;
  deleteMs: number;
}

export interface TrialResult {
  variant: Variant;
  loadFactor: number;
  samples: BenchmarkResult[];
}

export interface BenchmarkOptions {
  /**
   * 3 logs each phase with its timing.
   */
  verbose?: number;
  label?: string;
  log?: (message: string) => void;
}

export interface BenchmarkConfig {
  /**
   * Prefix for the CSV files.
   */
  name: string;
  n: number;
  repeats: number;
  loadFactors: Partial<Record<TableVariant, number[]>>;
  /**
   * Resample keys with replacement. Roughly 63% of keys stay distinct.
   */
  duplicates?: boolean;
  /**
   * Metrics written to CSV. Every metric is printed regardless.
   */
  plots?: readonly Metric[];
  errorBars?: boolean;
  verbose?: number;
  outDir?: string;
  random?: () => number;
  log?: (message: string) => void;
}

/**
 * Thrown when a table returns a value other than the last one written.
 */
export class BenchmarkMismatchError extends Error {
  constructor(label: string, key: unknown, actual: unknown, expected: unknown) {
    super(
      `${label}: value ${String(actual)} for key ${String(key)} did not match expected value ${String(expected)}`,
    );
    this.name = "BenchmarkMismatchError";
  }
}

const METRIC_FIELDS: Record<Metric, keyof BenchmarkResult> = {
  insert: "insertMs",
  lookup: "lookupMs",
  memory: "memoryMB",
  delete: "deleteMs",
};

const METRIC_TITLES: Record<Metric, string> = {
  insert: "Insertion Time (ms)",
  lookup: "Lookup Time (ms)",
  memory: "Memory Usage (MB)",
  delete: "Delete Time (ms)",
};

/**
 * The first `n` permutations of "abcdefghij" in lexicographic order.
 */
export function generateKeys(n: number): string[] {
  if (!Number.isSafeInteger(n) || n < 0 || n > MAX_KEYS) {
    throw new InvalidOptionError("N", `expected 0..${MAX_KEYS}, got ${n}`);
  }
  const keys: string[] = [];
  const chars = KEY_ALPHABET.split("");
  while (keys.length < n) {
    keys.push(chars.join(""));

    let i = chars.length - 2;
    while (i >= 0 && chars[i] >= chars[i + 1]) i--;
    if (i < 0) break;
    let j = chars.length - 1;
    while (chars[j] <= chars[i]) j--;
    [chars[i], chars[j]] = [chars[j], chars[i]];
    for (let lo = i + 1, hi = chars.length - 1; lo < hi; lo++, hi--) {
      [chars[lo], chars[hi]] = [chars[hi], chars[lo]];
    }
  }
  return keys;
}

/**
 * Fisher-Yates shuffle, in place.
 */
export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

export function createTable<K, V>(
  variant: Variant,
  maxLoadFactor: number,
): BenchmarkTarget<K, V> {
  const options: HashTableOptions<K> = { maxLoadFactor };
  switch (variant) {
    case "ChainingHashTable":
      return new ChainingHashTable<K, V>(options);
    case "LinearProbingHashTable":
      return new LinearProbingHashTable<K, V>(options);
    case "QuadraticProbingHashTable":
      return new QuadraticProbingHashTable<K, V>(options);
    case "Map":
      return new Map<K, V>();
  }
}

/**
 * Times inserts, lookups and deletes against one table and measures its size
 * once everything is inserted. Lookups double as a correctness check: every
 * key must return the last value written for it.
 */
export function benchmark<K, V>(
  table: BenchmarkTarget<K, V>,
  keys: readonly K[],
  values: readonly V[],
  deleteKeys: readonly K[],
  options: BenchmarkOptions = {},
): BenchmarkResult {
  const verbose = options.verbose ?? 0;
  const label = options.label ?? table.constructor.name;
  const log = options.log ?? console.log;

  // Insert
  let start = performance.now();
  for (let i = 0; i < keys.length; i++) {
    table.set(keys[i], values[i]);
  }
  const insertMs = performance.now() - start;
  if (verbose > 2) log(`${label} completed insertion benchmark in ${insertMs.toFixed(2)} ms`);

  // Last write wins; earlier writes of a key are looked up but not checked.
  const answers: Array<[K, V]> = [];
  const extras: K[] = [];
  const seen = new Set<K>();
  for (let i = keys.length - 1; i >= 0; i--) {
    if (seen.has(keys[i])) {
      extras.push(keys[i]);
      continue;
    }
    seen.add(keys[i]);
    answers.push([keys[i], values[i]]);
  }

  // Lookup
  start = performance.now();
  for (const [key, expected] of answers) {
    const actual = table.get(key);
    if (actual !== expected) {
      throw new BenchmarkMismatchError(label, key, actual, expected);
    }
  }
  for (const key of extras) {
    table.get(key);
  }
  const lookupMs = performance.now() - start;
  if (verbose > 2) log(`${label} completed lookup benchmark in ${lookupMs.toFixed(2)} ms`);

  // Memory
  const memoryMB = deepSizeOf(table) / 1e6;
  if (verbose > 2) log(`${label} used ${memoryMB.toFixed(2)} MB`);

  // Delete
  start = performance.now();
  for (const key of deleteKeys) {
    table.delete(key);
  }
  const deleteMs = performance.now() - start;
  if (verbose > 2) log(`${label} completed deletion benchmark in ${deleteMs.toFixed(2)} ms`);

  return { insertMs, lookupMs, memoryMB, deleteMs };
}

/**
 * Runs every variant at each of its load factors, plus a native `Map`
 * baseline over the union of all load factors, then prints one table per
 * metric and writes CSVs for the metrics in `plots`.
 */
export function runBenchmarks(config: BenchmarkConfig): TrialResult[] {
  const random = config.random ?? Math.random;
  const log = config.log ?? console.log;
  const verbose = config.verbose ?? 0;

  const plan = new Map<Variant, number[]>();
  const allLoadFactors = new Set<number>();
  for (const [variant, loadFactors] of Object.entries(config.loadFactors)) {
    if (!isTableVariant(variant) || !loadFactors) continue;
    const sorted = [...loadFactors].sort((a, b) => a - b);
    plan.set(variant, sorted);
    sorted.forEach((lf) => allLoadFactors.add(lf));
  }
  plan.set("Map", [...allLoadFactors].sort((a, b) => a - b));

  log(`____Beginning trial "${config.name}"____`);

  let keys = shuffle(generateKeys(config.n), random);
  if (config.duplicates) {
    keys = keys.map(() => keys[Math.floor(random() * keys.length)]);
  }
  const deleteKeys = shuffle([...new Set(keys)], random);
  const values = keys.map(() => random());

  const results: TrialResult[] = [];
  for (const [variant, loadFactors] of plan) {
    if (verbose === 1) log(`Running benchmarks for ${variant}`);
    for (const loadFactor of loadFactors) {
      const label = variant === "Map" ? variant : `${variant}(maxLoadFactor=${loadFactor})`;
      if (verbose > 1) log(`Running benchmarks for ${label}`);

      const samples: BenchmarkResult[] = [];
      for (let r = 0; r < config.repeats; r++) {
        const table = createTable<string, number>(variant, loadFactor);
        samples.push(benchmark(table, keys, values, deleteKeys, { verbose, label, log }));
      }
      results.push({ variant, loadFactor, samples });
    }
  }

  const suffix = config.duplicates ? " with duplicates" : "";
  const plots = new Set(config.plots ?? METRICS);
  for (const metric of METRICS) {
    log("");
    log(`${METRIC_TITLES[metric]}${suffix}, #keys = ${config.n}, ${config.repeats} repetitions`);
    log(renderTable(results, metric, config.errorBars));
    if (plots.has(metric)) {
      const file = writeCsv(config.outDir ?? "plots", config.name, metric, results, config.errorBars);
      if (verbose > 0) log(`Wrote ${file}`);
    }
  }

  return results;
}

function isTableVariant(name: string): name is TableVariant {
  return (
    name === "ChainingHashTable" ||
    name === "LinearProbingHashTable" ||
    name === "QuadraticProbingHashTable"
  );
}

/**
 * Mean and (population) standard deviation of one metric over the samples.
 */
export function summarize(
  samples: readonly BenchmarkResult[],
  metric: Metric,
): { mean: number; std: number } {
  if (samples.length === 0) return { mean: NaN, std: NaN };
  const field = METRIC_FIELDS[metric];
  const data = samples.map((s) => s[field]);
  const mean = data.reduce((a, b) => a + b, 0) / data.length;
  const variance = data.reduce((a, b) => a + (b - mean) ** 2, 0) / data.length;
  return { mean, std: Math.sqrt(variance) };
}

/**
 * One markdown table: a row per variant, a column per load factor.
 */
export function renderTable(
  results: readonly TrialResult[],
  metric: Metric,
  errorBars = false,
): string {
  const loadFactors = [...new Set(results.map((r) => r.loadFactor))].sort((a, b) => a - b);
  const variants = [...new Set(results.map((r) => r.variant))];

  const lines = [
    `| Variant | ${loadFactors.join(" | ")} |`,
    `|---|${loadFactors.map(() => "---").join("|")}|`,
  ];
  for (const variant of variants) {
    const cells = loadFactors.map((lf) => {
      const trial = results.find((r) => r.variant === variant && r.loadFactor === lf);
      if (!trial) return "-";
      const { mean, std } = summarize(trial.samples, metric);
      return errorBars ? `${mean.toFixed(2)} ± ${std.toFixed(2)}` : mean.toFixed(2);
    });
    lines.push(`| ${variant} | ${cells.join(" | ")} |`);
  }
  return lines.join("\n");
}

/**
 * Writes `<outDir>/<name>_<metric>.csv` and returns its path.
 */
export function writeCsv(
  outDir: string,
  name: string,
  metric: Metric,
  results: readonly TrialResult[],
  errorBars = false,
): string {
  fs.mkdirSync(outDir, { recursive: true });
  const rows = [errorBars ? "variant,loadFactor,mean,std" : "variant,loadFactor,mean"];
  for (const trial of results) {
    const { mean, std } = summarize(trial.samples, metric);
    const row = [trial.variant, String(trial.loadFactor), mean.toFixed(6)];
    if (errorBars) row.push(std.toFixed(6));
    rows.push(row.join(","));
  }
  const file = path.join(outDir, `${name}_${metric}.csv`);
  fs.writeFileSync(file, rows.join("\n") + "\n");
  return file;
}

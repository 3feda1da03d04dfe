import { StructuralInvariantError } from "./errors";

export type BinarizationDirection = "right" | "left" | "heuristic";

export type LogLevel = "error" | "warn" | "info" | "debug";

export type TreebankConfig = {
  topLabel: string;
  sentinel: string;
  minCount: number;
  emptyLabel: string;
  direction: BinarizationDirection;
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG: Readonly<TreebankConfig> = Object.freeze<TreebankConfig>({
  topLabel: "TOP",
  sentinel: "<unk>",
  minCount: 2,
  emptyLabel: "-NONE-",
  direction: "right",
  logLevel: "info",
});

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
const DIRECTIONS: readonly BinarizationDirection[] = ["right", "left", "heuristic"];

export const RESERVED_MARKERS = ["*", "_"] as const;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isDirection(value: string): value is BinarizationDirection {
  return DIRECTIONS.some((direction) => direction === value);
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<Record<keyof TreebankConfig, string>> {
  return {
    topLabel: env.TREEBANK_TOP_LABEL,
    sentinel: env.TREEBANK_SENTINEL,
    minCount: env.TREEBANK_MIN_COUNT,
    emptyLabel: env.TREEBANK_EMPTY_LABEL,
    direction: env.TREEBANK_DIRECTION,
    logLevel: env.TREEBANK_LOG_LEVEL,
  };
}

export type ConfigOverrides = {
  topLabel?: string;
  sentinel?: string;
  minCount?: number | string;
  emptyLabel?: string;
  direction?: string;
  logLevel?: string;
};

function pick<T>(...values: Array<T | undefined>): T | undefined {
  for (const value of values) if (value !== undefined && value !== "") return value;
  return undefined;
}

/**
 * Merges explicit overrides over `TREEBANK_*` environment variables over
 * {@link DEFAULT_CONFIG}, rejecting values the pipeline cannot honour.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): TreebankConfig {
  const fromEnv = envOverrides(env);

  const topLabel = pick(overrides.topLabel, fromEnv.topLabel) ?? DEFAULT_CONFIG.topLabel;
  for (const marker of RESERVED_MARKERS) {
    if (topLabel.includes(marker)) throw new StructuralInvariantError(`top label '${topLabel}' contains reserved marker '${marker}'`);
  }
  if (/[\s()]/.test(topLabel)) throw new StructuralInvariantError(`top label '${topLabel}' is not a bracket token`);

  const sentinel = pick(overrides.sentinel, fromEnv.sentinel) ?? DEFAULT_CONFIG.sentinel;
  if (/[\s()]/.test(sentinel)) throw new StructuralInvariantError(`sentinel '${sentinel}' is not a bracket token`);

  const rawMinCount = pick<number | string>(overrides.minCount, fromEnv.minCount) ?? DEFAULT_CONFIG.minCount;
  const minCount = Number(rawMinCount);
  if (!Number.isInteger(minCount) || minCount < 1) {
    throw new StructuralInvariantError(`minCount must be a positive integer, got '${rawMinCount}'`);
  }

  const emptyLabel = pick(overrides.emptyLabel, fromEnv.emptyLabel) ?? DEFAULT_CONFIG.emptyLabel;

  const direction = pick(overrides.direction, fromEnv.direction) ?? DEFAULT_CONFIG.direction;
  if (!isDirection(direction)) throw new StructuralInvariantError(`unknown binarization direction '${direction}'`);

  const logLevel = (pick(overrides.logLevel, fromEnv.logLevel) ?? DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) throw new StructuralInvariantError(`unknown log level '${logLevel}'`);

  return { topLabel, sentinel, minCount, emptyLabel, direction, logLevel };
}

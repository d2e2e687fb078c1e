/**
 * @fileoverview Trainer Configuration Loader
 *
 * Loads trainer settings from a YAML file and applies environment
 * overrides on top.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { DEFAULT_ALPHA, isScoringMode, SCORING_MODES, type ScoringMode } from "@spam-bayes/engine";

/**
 * Trainer settings.
 */
export interface TrainerConfig {
    /** Path to the labeled dataset, resolved against the app directory when relative */
    readonly dataset: string;

    /** Additive smoothing constant */
    readonly alpha: number;

    /** Share of the shuffled dataset used for training (0 < f < 1) */
    readonly trainFraction: number;

    /** Seed for the train/test shuffle, 0..MAX_SEED */
    readonly seed: number;

    readonly scoring: ScoringMode;
}

/**
 * Environment variables read by applyEnvOverrides(), keyed by config field.
 */
export const ENV_OVERRIDES = {
    dataset      : "SPAM_DATASET",
    alpha        : "SPAM_ALPHA",
    trainFraction: "SPAM_TRAIN_FRACTION",
    seed         : "SPAM_SEED",
    scoring      : "SPAM_SCORING",
} as const satisfies Record<keyof TrainerConfig, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === "string" && value.trim() !== "";
}

function isSmoothing(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isFraction(value: unknown): value is number {
    return typeof value === "number" && value > 0 && value < 1;
}

/** Largest seed the 32-bit shuffle generator can tell apart */
export const MAX_SEED = 0xffffffff;

function isSeed(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_SEED;
}

/**
 * Read one field: undefined keeps the fallback, anything the guard rejects throws.
 */
function pick<T>(
    raw: Record<string, unknown>,
    field: keyof TrainerConfig,
    fallback: T,
    accept: (value: unknown) => value is T,
    source: string,
    expected: string
): T {
    const value = raw[field];

    if (value === undefined) {
        return fallback;
    }

    if (!accept(value)) {
        throw new Error(`Invalid '${field}' in ${source}: expected ${expected}`);
    }

    return value;
}

/**
 * Validate raw settings and merge them over a base config.
 */
function mergeConfig(base: TrainerConfig, raw: Record<string, unknown>, source: string): TrainerConfig {
    return {
        dataset      : pick(raw, "dataset", base.dataset, isNonEmptyString, source, "a non-empty path"),
        alpha        : pick(raw, "alpha", base.alpha, isSmoothing, source, "a finite number >= 0"),
        trainFraction: pick(raw, "trainFraction", base.trainFraction, isFraction, source, "a number between 0 and 1 (exclusive)"),
        seed         : pick(raw, "seed", base.seed, isSeed, source, `an integer between 0 and ${MAX_SEED}`),
        scoring      : pick(raw, "scoring", base.scoring, isScoringMode, source, `one of ${SCORING_MODES.join(", ")}`),
    };
}

/**
 * Load trainer settings from a YAML file.
 *
 * Missing fields fall back to getDefaultConfig().
 *
 * @param filePath - Path to trainer.yml
 * @throws Error if the file doesn't exist or a field is invalid
 *
 * @example
 * ```typescript
 * const config = loadTrainerConfig("./config/trainer.yml");
 * // { dataset: "data/sample-messages.tsv", alpha: 1, trainFraction: 0.8, seed: 42, scoring: "product" }
 * ```
 */
export function loadTrainerConfig(filePath: string): TrainerConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Trainer config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (parsed === null || parsed === undefined) {
        return getDefaultConfig();
    }

    if (!isRecord(parsed)) {
        throw new Error("Invalid trainer config format: expected a mapping of settings");
    }

    return mergeConfig(getDefaultConfig(), parsed, filePath);
}

/**
 * Load trainer settings with fallback to the defaults.
 *
 * @param filePath - Path to trainer.yml
 */
export function loadTrainerConfigWithFallback(filePath: string): TrainerConfig {
    try {
        return loadTrainerConfig(filePath);
    }
    catch (error) {
        console.warn(`Failed to load trainer config from ${filePath}:`, error instanceof Error ? error.message : String(error));
        return getDefaultConfig();
    }
}

/**
 * Apply SPAM_* environment variables over a config.
 * Empty values are ignored.
 *
 * @param config - Config loaded from file
 * @param env - Environment (default: process.env)
 * @throws Error if a variable holds an invalid value
 */
export function applyEnvOverrides(config: TrainerConfig, env: NodeJS.ProcessEnv = process.env): TrainerConfig {
    const read = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };
    const readNumber = (name: string): number | string | undefined => {
        const value = read(name);
        if (value === undefined) {
            return undefined;
        }
        const parsed = Number(value);
        return Number.isNaN(parsed) ? value : parsed;
    };

    return mergeConfig(config, {
        dataset      : read(ENV_OVERRIDES.dataset),
        alpha        : readNumber(ENV_OVERRIDES.alpha),
        trainFraction: readNumber(ENV_OVERRIDES.trainFraction),
        seed         : readNumber(ENV_OVERRIDES.seed),
        scoring      : read(ENV_OVERRIDES.scoring),
    }, "environment");
}

/**
 * Get the default trainer settings.
 */
export function getDefaultConfig(): TrainerConfig {
    return {
        dataset      : "data/sample-messages.tsv",
        alpha        : DEFAULT_ALPHA,
        trainFraction: 0.8,
        seed         : 42,
        scoring      : "product",
    };
}

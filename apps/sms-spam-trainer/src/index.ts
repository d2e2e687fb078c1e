/**
 * @fileoverview SMS Spam Trainer - Main Entry Point
 *
 * Trains a Naive Bayes spam filter on a labeled SMS dataset, reports its
 * accuracy on a held-out split and optionally classifies messages given
 * on the command line.
 *
 * Settings are applied in order: config/trainer.yml (or --config), SPAM_*
 * environment variables, then --scoring.
 *
 * @module sms-spam-trainer
 */

// Load .env before anything reads SPAM_* variables
import "dotenv/config";

import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

import { NaiveBayesClassifier, createScopedLogger, defaultLogger } from "@spam-bayes/engine";

import { parseArgs, USAGE, type CliArgs } from "./cli/index.js";
import {
    applyEnvOverrides,
    loadTrainerConfig,
    loadTrainerConfigWithFallback,
    type TrainerConfig,
} from "./config/index.js";
import { formatPrediction, formatReport } from "./report/index.js";
import { runTrainer } from "./runner.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** App directory; the default config and relative dataset paths live under it */
const APP_ROOT = join(__dirname, "..");

/**
 * Resolve settings from file, environment and flags.
 *
 * An explicit --config must load; the default file falls back to defaults.
 */
function resolveConfig(args: CliArgs): TrainerConfig {
    const fromFile = args.configPath !== undefined
        ? loadTrainerConfig(args.configPath)
        : loadTrainerConfigWithFallback(join(APP_ROOT, "config", "trainer.yml"));

    const config = applyEnvOverrides(fromFile);

    return args.scoring ? { ...config, scoring: args.scoring } : config;
}

/**
 * Main entry point.
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code
 */
export function main(argv: readonly string[]): number {
    let args: CliArgs;

    try {
        args = parseArgs(argv);
    }
    catch (error) {
        console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}\n`);
        console.error(USAGE);
        return 2;
    }

    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    console.log("=".repeat(60));
    console.log("SMS Spam Trainer");
    console.log("=".repeat(60));

    try {
        const config = resolveConfig(args);
        const logger = createScopedLogger(defaultLogger, "trainer");
        const result = runTrainer(config, { baseDir: APP_ROOT, logger });

        console.log("");
        for (const line of formatReport(result)) {
            console.log(line);
        }

        if (args.messages.length > 0) {
            const classifier = new NaiveBayesClassifier(result.model, { scoring: config.scoring, logger });

            console.log("");
            for (const text of args.messages) {
                console.log(formatPrediction(text, classifier.predict(text)));
            }
        }

        return 0;
    }
    catch (error) {
        console.error("[FATAL] Training failed:", error instanceof Error ? error.message : String(error));
        return 1;
    }
}

// Run if this is the main module
if (process.argv[1] && resolve(process.argv[1]) === __filename) {
    process.exitCode = main(process.argv.slice(2));
}

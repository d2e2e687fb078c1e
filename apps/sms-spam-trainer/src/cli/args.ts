/**
 * @fileoverview Command-line arguments
 *
 * @module cli/args
 */

import { isScoringMode, SCORING_MODES, type ScoringMode } from "@spam-bayes/engine";

/**
 * Parsed command line.
 */
export interface CliArgs {
    /** --config <path> */
    readonly configPath?: string;

    /** --scoring <product|log>, overrides config and environment */
    readonly scoring?: ScoringMode;

    /** --message <text>, repeatable */
    readonly messages: string[];

    /** --help / -h */
    readonly help: boolean;
}

export const USAGE = `Usage: sms-spam-trainer [options]

Options:
  --config <path>      Trainer config file (default: config/trainer.yml)
  --scoring <mode>     Scoring mode: ${SCORING_MODES.join(" | ")}
  --message <text>     Classify a message with the trained model (repeatable)
  -h, --help           Show this help`;

function requireValue(option: string, value: string | undefined): string {
    if (value === undefined) {
        throw new Error(`Option ${option} requires a value`);
    }
    return value;
}

/**
 * Parse CLI arguments (without the node and script entries).
 *
 * @throws Error on an unknown option, a missing value or an invalid scoring mode
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    let configPath: string | undefined;
    let scoring: ScoringMode | undefined;
    const messages: string[] = [];
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next: string | undefined = argv[i + 1];

        switch (arg) {
            case "--config":
                configPath = requireValue(arg, next);
                i++;
                break;

            case "--scoring": {
                const mode = requireValue(arg, next);
                i++;
                if (!isScoringMode(mode)) {
                    throw new Error(`Invalid --scoring value "${mode}": expected one of ${SCORING_MODES.join(", ")}`);
                }
                scoring = mode;
                break;
            }

            case "--message":
                messages.push(requireValue(arg, next));
                i++;
                break;

            case "--help":
            case "-h":
                help = true;
                break;

            default:
                throw new Error(arg.startsWith("-") ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
        }
    }

    return { configPath, scoring, messages, help };
}

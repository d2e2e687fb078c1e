/**
 * @fileoverview Trainer pipeline
 *
 * Load, split, train and evaluate, in that order. Formatting and process
 * exit codes belong to the entry point.
 *
 * @module runner
 */

import { isAbsolute, resolve } from "path";
import {
    defaultLogger,
    evaluateModel,
    trainModel,
    type EvaluationReport,
    type Logger,
    type NaiveBayesModel,
    type ScoringMode,
} from "@spam-bayes/engine";
import type { TrainerConfig } from "./config/index.js";
import { loadDataset, splitDataset } from "./dataset/index.js";

/**
 * Runner options.
 */
export interface RunOptions {
    /** Directory a relative dataset path is resolved against (default: cwd) */
    readonly baseDir?: string;

    readonly logger?: Logger;
}

/**
 * Outcome of one training run.
 */
export interface TrainerResult {
    readonly model: NaiveBayesModel;

    /** Evaluation on the held-out split */
    readonly report: EvaluationReport;

    readonly trainingSize: number;
    readonly testSize: number;
    readonly scoring: ScoringMode;
}

/**
 * Resolve the dataset path from the config.
 */
export function resolveDatasetPath(dataset: string, baseDir: string): string {
    return isAbsolute(dataset) ? dataset : resolve(baseDir, dataset);
}

/**
 * Run the trainer once.
 *
 * @param config - Trainer settings
 * @param options - Base directory and logger
 * @throws Error if the dataset cannot be loaded, InvalidInputError if the
 *         training split is empty
 */
export function runTrainer(config: TrainerConfig, options: RunOptions = {}): TrainerResult {
    const logger      = options.logger ?? defaultLogger;
    const datasetPath = resolveDatasetPath(config.dataset, options.baseDir ?? process.cwd());

    const messages = loadDataset(datasetPath);
    logger.info("Dataset loaded", {
        path    : datasetPath,
        messages: messages.length,
    });

    const { training, test } = splitDataset(messages, {
        trainFraction: config.trainFraction,
        seed         : config.seed,
    });

    const model  = trainModel(training, { alpha: config.alpha, logger });
    const report = evaluateModel(model, test, { scoring: config.scoring, logger });

    logger.info("Evaluation complete", {
        scoring : config.scoring,
        test    : report.total,
        correct : report.correct,
        accuracy: report.accuracy,
    });

    return {
        model,
        report,
        trainingSize: training.length,
        testSize    : test.length,
        scoring     : config.scoring,
    };
}

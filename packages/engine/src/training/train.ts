/**
 * @fileoverview Training entry point
 *
 * Validates labeled messages, tokenizes them, aggregates counts and
 * estimates the model. Training is all-or-nothing: any invalid input
 * aborts before a model is produced.
 *
 * @module @spam-bayes/engine/training/train
 */

import { isLabel, LABELS } from "../contracts/Label.js";
import type { LabeledMessage } from "../contracts/TrainingExample.js";
import { defaultLogger, type Logger } from "../contracts/Logger.js";
import { InvalidInputError } from "../errors/InvalidInputError.js";
import type { NaiveBayesModel } from "../model/NaiveBayesModel.js";
import { tokenize } from "../text/tokenize.js";
import { DEFAULT_ALPHA, estimateParameters, validateAlpha } from "./ParameterEstimator.js";
import { VocabularyBuilder } from "./VocabularyBuilder.js";

/**
 * Training options.
 */
export interface TrainOptions {
    /** Additive smoothing constant (default: 1) */
    readonly alpha?: number;

    /** Logger for training progress */
    readonly logger?: Logger;
}

/**
 * Train a spam/ham model.
 *
 * @param messages - Labeled raw messages
 * @param options - Smoothing constant and logger
 * @returns The trained model
 * @throws InvalidInputError when the collection is empty, alpha is negative or
 *         not finite, a label is not spam/ham, or a text is not a string
 *
 * @example
 * ```typescript
 * const model = trainModel([
 *     { label: Label.Spam, text: "WIN a free prize now" },
 *     { label: Label.Ham, text: "see you at lunch" },
 * ]);
 * ```
 */
export function trainModel(
    messages: readonly LabeledMessage[],
    options: TrainOptions = {}
): NaiveBayesModel {
    const alpha  = options.alpha ?? DEFAULT_ALPHA;
    const logger = options.logger ?? defaultLogger;

    validateAlpha(alpha);

    if (messages.length === 0) {
        throw new InvalidInputError("empty-training-set", "Cannot train a model without training examples");
    }

    logger.debug("Training model", {
        examples: messages.length,
        alpha,
    });

    const builder = new VocabularyBuilder();

    messages.forEach((message, index) => {
        const label: unknown = message.label;
        const text: unknown  = message.text;

        if (!isLabel(label)) {
            throw new InvalidInputError(
                "invalid-label",
                `Invalid label at index ${index}: "${String(label)}" (expected one of ${LABELS.join(", ")})`
            );
        }

        if (typeof text !== "string") {
            throw new InvalidInputError("invalid-text", `Invalid text at index ${index}: expected a string`);
        }

        builder.add({ label, tokens: tokenize(text) });
    });

    const statistics = builder.build();
    const model = estimateParameters(statistics, alpha);

    logger.info("Model trained", {
        examples      : statistics.totalExamples,
        vocabularySize: model.vocabularySize,
        spamExamples  : statistics.exampleCounts.spam,
        hamExamples   : statistics.exampleCounts.ham,
        spamTokens    : statistics.tokenTotals.spam,
        hamTokens     : statistics.tokenTotals.ham,
    });

    return model;
}

/**
 * @fileoverview Model evaluation
 *
 * Accuracy and confusion counts over a held-out labeled set, with spam as
 * the positive class. Formatting is left to callers.
 *
 * @module @spam-bayes/engine/evaluation/evaluate
 */

import { Label } from "../contracts/Label.js";
import type { LabeledMessage } from "../contracts/TrainingExample.js";
import { classify, type ClassifyOptions } from "../inference/classify.js";
import type { NaiveBayesModel } from "../model/NaiveBayesModel.js";

/**
 * Confusion counts with spam as the positive class.
 */
export interface ConfusionMatrix {
    /** Spam classified as spam */
    readonly truePositive: number;

    /** Ham classified as spam */
    readonly falsePositive: number;

    /** Ham classified as ham */
    readonly trueNegative: number;

    /** Spam classified as ham */
    readonly falseNegative: number;
}

export interface EvaluationReport {
    readonly total: number;
    readonly correct: number;

    /** correct / total, or 0 for an empty set */
    readonly accuracy: number;

    readonly confusion: ConfusionMatrix;
}

/**
 * Evaluate a model on labeled messages.
 *
 * @param model - Trained model
 * @param examples - Held-out labeled messages
 * @param options - Passed through to classify()
 */
export function evaluateModel(
    model: NaiveBayesModel,
    examples: readonly LabeledMessage[],
    options: ClassifyOptions = {}
): EvaluationReport {
    let truePositive  = 0;
    let falsePositive = 0;
    let trueNegative  = 0;
    let falseNegative = 0;

    for (const example of examples) {
        const predicted = classify(model, example.text, options);

        if (example.label === Label.Spam) {
            if (predicted === Label.Spam) {
                truePositive++;
            }
            else {
                falseNegative++;
            }
        }
        else if (predicted === Label.Spam) {
            falsePositive++;
        }
        else {
            trueNegative++;
        }
    }

    const total   = examples.length;
    const correct = truePositive + trueNegative;

    return Object.freeze({
        total,
        correct,
        accuracy : total === 0 ? 0 : correct / total,
        confusion: Object.freeze({
            truePositive,
            falsePositive,
            trueNegative,
            falseNegative,
        }),
    });
}

/**
 * @fileoverview Parameter Estimator
 *
 * Turns training statistics into priors and Laplace-smoothed likelihoods:
 *
 *     prior[L]         = examples[L] / totalExamples
 *     likelihood[L][t] = (count[L][t] + alpha) / (tokenTotal[L] + alpha * |V|)
 *
 * Every vocabulary token gets a likelihood under every label, including
 * labels it never appeared under. For a fixed label the likelihoods sum to 1.
 *
 * @module @spam-bayes/engine/training/ParameterEstimator
 */

import { mapLabels } from "../contracts/Label.js";
import { InvalidInputError } from "../errors/InvalidInputError.js";
import { NaiveBayesModel } from "../model/NaiveBayesModel.js";
import type { TrainingStatistics } from "./VocabularyBuilder.js";

/**
 * Default additive smoothing constant.
 */
export const DEFAULT_ALPHA = 1;

/**
 * Check that a smoothing constant is usable.
 *
 * `alpha = 0` is accepted: the caller opts into zero likelihoods for tokens
 * a label has never seen.
 *
 * @throws InvalidInputError for negative, NaN or infinite values
 */
export function validateAlpha(alpha: number): void {
    if (!Number.isFinite(alpha)) {
        throw new InvalidInputError("non-finite-alpha", `Smoothing constant must be a finite number, got ${alpha}`);
    }

    if (alpha < 0) {
        throw new InvalidInputError("negative-alpha", `Smoothing constant must be >= 0, got ${alpha}`);
    }
}

/**
 * Estimate model parameters.
 *
 * A label with no training examples gets prior 0 and so can never win a
 * comparison. With `alpha > 0` its likelihoods are uniform (`1 / |V|`).
 * With `alpha = 0` and no training tokens for a label the denominator is
 * 0, and every likelihood for that label is set to 0.
 *
 * @param statistics - Output of the vocabulary builder
 * @param alpha - Additive smoothing constant
 * @returns Immutable trained model
 * @throws InvalidInputError if there are no examples or alpha is invalid
 */
export function estimateParameters(
    statistics: TrainingStatistics,
    alpha: number = DEFAULT_ALPHA
): NaiveBayesModel {
    validateAlpha(alpha);

    if (statistics.totalExamples === 0) {
        throw new InvalidInputError("empty-training-set", "Cannot train a model without training examples");
    }

    const vocabularySize = statistics.vocabulary.length;

    const priors = mapLabels((label) => statistics.exampleCounts[label] / statistics.totalExamples);

    const likelihoods = mapLabels((label) => {
        const counts      = statistics.tokenCounts[label];
        const denominator = statistics.tokenTotals[label] + alpha * vocabularySize;

        return statistics.vocabulary.map((token) => {
            if (denominator === 0) {
                return 0;
            }
            return ((counts.get(token) ?? 0) + alpha) / denominator;
        });
    });

    return new NaiveBayesModel({
        alpha,
        vocabulary   : statistics.vocabulary,
        priors,
        likelihoods,
        tokenTotals  : statistics.tokenTotals,
        exampleCounts: statistics.exampleCounts,
    });
}

/**
 * @fileoverview NaiveBayesModel
 *
 * The trained, immutable artifact shared by every classification call.
 *
 * Tokens are interned to integer ids; per-label likelihoods live in dense
 * frozen arrays indexed by token id. Nothing is computed lazily, so the
 * model carries no mutable cache and can be read from any number of
 * callers at once.
 *
 * @module @spam-bayes/engine/model/NaiveBayesModel
 */

import { LABELS, mapLabels, type Label } from "../contracts/Label.js";
import type { Token } from "../contracts/TrainingExample.js";

/**
 * Everything needed to construct a model. Produced by the estimator.
 */
export interface NaiveBayesModelData {
    readonly alpha: number;

    /** Vocabulary in token-id order */
    readonly vocabulary: readonly Token[];

    readonly priors: Readonly<Record<Label, number>>;

    /** likelihoods[label][tokenId] */
    readonly likelihoods: Readonly<Record<Label, readonly number[]>>;

    readonly tokenTotals: Readonly<Record<Label, number>>;
    readonly exampleCounts: Readonly<Record<Label, number>>;
}

/**
 * Trained Multinomial Naive Bayes model.
 *
 * @example
 * ```typescript
 * const model = trainModel(messages);
 *
 * model.prior(Label.Spam);           // 0.25
 * model.vocabularySize;              // 42
 * model.likelihood(Label.Ham, "ok"); // 0.031...
 * model.likelihood(Label.Ham, "zz"); // undefined (not in vocabulary)
 * ```
 */
export class NaiveBayesModel {
    /** Smoothing constant the model was estimated with */
    readonly alpha: number;

    private readonly tokens: readonly Token[];
    private readonly tokenIds: ReadonlyMap<Token, number>;
    private readonly priorByLabel: Readonly<Record<Label, number>>;
    private readonly likelihoodsByLabel: Readonly<Record<Label, readonly number[]>>;
    private readonly tokenTotals: Readonly<Record<Label, number>>;
    private readonly exampleCounts: Readonly<Record<Label, number>>;

    constructor(data: NaiveBayesModelData) {
        for (const label of LABELS) {
            if (data.likelihoods[label].length !== data.vocabulary.length) {
                throw new Error(
                    `Likelihood table for "${label}" has ${data.likelihoods[label].length} entries, expected ${data.vocabulary.length}`
                );
            }
        }

        const tokenIds = new Map<Token, number>();
        data.vocabulary.forEach((token, index) => tokenIds.set(token, index));

        if (tokenIds.size !== data.vocabulary.length) {
            throw new Error("Vocabulary contains duplicate tokens");
        }

        this.alpha              = data.alpha;
        this.tokens             = Object.freeze([...data.vocabulary]);
        this.tokenIds           = tokenIds;
        this.priorByLabel       = Object.freeze(mapLabels((label) => data.priors[label]));
        this.likelihoodsByLabel = Object.freeze(mapLabels<readonly number[]>((label) => Object.freeze([...data.likelihoods[label]])));
        this.tokenTotals        = Object.freeze(mapLabels((label) => data.tokenTotals[label]));
        this.exampleCounts      = Object.freeze(mapLabels((label) => data.exampleCounts[label]));

        Object.freeze(this);
    }

    /**
     * Number of distinct tokens known to the model.
     */
    get vocabularySize(): number {
        return this.tokens.length;
    }

    /**
     * Number of training examples the model was estimated from.
     */
    get totalExamples(): number {
        return LABELS.reduce((sum, label) => sum + this.exampleCounts[label], 0);
    }

    /**
     * Prior probability of a label.
     */
    prior(label: Label): number {
        return this.priorByLabel[label];
    }

    /**
     * All priors, keyed by label.
     */
    priors(): Readonly<Record<Label, number>> {
        return this.priorByLabel;
    }

    /**
     * Smoothed likelihood of a token given a label.
     *
     * @returns The likelihood, or undefined when the token is outside the vocabulary
     */
    likelihood(label: Label, token: Token): number | undefined {
        const index = this.tokenIds.get(token);
        return index === undefined ? undefined : this.likelihoodsByLabel[label][index];
    }

    /**
     * Likelihood by token id. Ids range over `[0, vocabularySize)`.
     */
    likelihoodAt(label: Label, index: number): number {
        const value = this.likelihoodsByLabel[label][index];

        if (value === undefined) {
            throw new RangeError(`Token id out of range: ${index}`);
        }

        return value;
    }

    /**
     * Token id, or undefined for tokens outside the vocabulary.
     */
    tokenIndex(token: Token): number | undefined {
        return this.tokenIds.get(token);
    }

    hasToken(token: Token): boolean {
        return this.tokenIds.has(token);
    }

    /**
     * The vocabulary in token-id order.
     */
    vocabulary(): readonly Token[] {
        return this.tokens;
    }

    /**
     * Total number of training tokens seen for a label.
     */
    tokenTotal(label: Label): number {
        return this.tokenTotals[label];
    }

    /**
     * Number of training examples carrying a label.
     */
    exampleCount(label: Label): number {
        return this.exampleCounts[label];
    }
}

/**
 * @fileoverview Vocabulary & Frequency Builder
 *
 * Aggregates tokenized training examples into the global vocabulary and the
 * per-label token counts that the parameter estimator consumes.
 *
 * The builder owns its accumulator only while training is in progress.
 * `build()` hands back an immutable snapshot and resets the builder, so no
 * aggregation state outlives model construction.
 *
 * @module @spam-bayes/engine/training/VocabularyBuilder
 */

import { LABELS, mapLabels, type Label } from "../contracts/Label.js";
import type { Token, TrainingExample } from "../contracts/TrainingExample.js";

/**
 * Aggregated counts for a training set.
 */
export interface TrainingStatistics {
    /** Distinct tokens across all labels, in first-seen order */
    readonly vocabulary: readonly Token[];

    /** Occurrences of each token per label (absent means 0) */
    readonly tokenCounts: Readonly<Record<Label, ReadonlyMap<Token, number>>>;

    /** Sum of example lengths per label, repeats included */
    readonly tokenTotals: Readonly<Record<Label, number>>;

    /** Number of training examples per label */
    readonly exampleCounts: Readonly<Record<Label, number>>;

    /** Number of training examples overall */
    readonly totalExamples: number;
}

/**
 * Accumulates vocabulary and frequencies from training examples.
 *
 * @example
 * ```typescript
 * const builder = new VocabularyBuilder();
 * builder.add({ label: Label.Spam, tokens: ["win", "cash", "now"] });
 * builder.add({ label: Label.Ham, tokens: ["see", "you", "now"] });
 *
 * const stats = builder.build();
 * stats.vocabulary;           // ["win", "cash", "now", "see", "you"]
 * stats.tokenTotals.spam;     // 3
 * ```
 */
export class VocabularyBuilder {
    private vocabulary    = new Set<Token>();
    private tokenCounts   = mapLabels(() => new Map<Token, number>());
    private tokenTotals   = mapLabels(() => 0);
    private exampleCounts = mapLabels(() => 0);

    /**
     * Number of examples added since the last build.
     */
    get size(): number {
        return LABELS.reduce((sum, label) => sum + this.exampleCounts[label], 0);
    }

    /**
     * Add one tokenized example.
     */
    add(example: TrainingExample): this {
        const counts = this.tokenCounts[example.label];

        this.exampleCounts[example.label] += 1;
        this.tokenTotals[example.label]   += example.tokens.length;

        for (const token of example.tokens) {
            this.vocabulary.add(token);
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }

        return this;
    }

    /**
     * Add several tokenized examples.
     */
    addAll(examples: Iterable<TrainingExample>): this {
        for (const example of examples) {
            this.add(example);
        }
        return this;
    }

    /**
     * Produce the immutable statistics and reset the builder.
     */
    build(): TrainingStatistics {
        const statistics: TrainingStatistics = Object.freeze({
            vocabulary   : Object.freeze([...this.vocabulary]),
            tokenCounts  : Object.freeze(mapLabels<ReadonlyMap<Token, number>>((label) => new Map(this.tokenCounts[label]))),
            tokenTotals  : Object.freeze({ ...this.tokenTotals }),
            exampleCounts: Object.freeze({ ...this.exampleCounts }),
            totalExamples: this.size,
        });

        this.reset();
        return statistics;
    }

    /**
     * Discard everything accumulated so far.
     */
    reset(): void {
        this.vocabulary    = new Set<Token>();
        this.tokenCounts   = mapLabels(() => new Map<Token, number>());
        this.tokenTotals   = mapLabels(() => 0);
        this.exampleCounts = mapLabels(() => 0);
    }
}

/**
 * Build statistics for a complete set of examples in one call.
 */
export function buildStatistics(examples: Iterable<TrainingExample>): TrainingStatistics {
    return new VocabularyBuilder().addAll(examples).build();
}

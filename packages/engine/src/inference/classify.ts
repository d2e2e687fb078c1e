/**
 * @fileoverview Scoring and decision
 *
 * Scores a raw message against a trained model and picks a label.
 *
 * Scoring modes:
 * - "product" (default): prior × likelihood × likelihood × ..., in token
 *   order. Long messages can underflow to 0 under both labels.
 * - "log": log(prior) + Σ log(likelihood). Opt-in; can disagree with
 *   "product" near ties or where "product" underflows.
 *
 * Tokens outside the model vocabulary are skipped. The label with the
 * strictly greatest score wins; an exact tie returns DEFAULT_LABEL unless
 * its prior is 0, in which case the label that has training examples wins.
 *
 * @module @spam-bayes/engine/inference/classify
 */

import { DEFAULT_LABEL, LABELS, mapLabels, type Label } from "../contracts/Label.js";
import { defaultLogger, type Logger } from "../contracts/Logger.js";
import type { NaiveBayesModel } from "../model/NaiveBayesModel.js";
import { tokenize } from "../text/tokenize.js";

/**
 * How per-token evidence is combined.
 */
export type ScoringMode = "product" | "log";

export const SCORING_MODES: readonly ScoringMode[] = Object.freeze(["product", "log"]);

/**
 * Type guard for ScoringMode values.
 */
export function isScoringMode(value: unknown): value is ScoringMode {
    return value === "product" || value === "log";
}

/**
 * Classification options.
 */
export interface ClassifyOptions {
    /** Scoring mode (default: "product") */
    readonly scoring?: ScoringMode;

    /** Receives a warning when every score has collapsed to zero */
    readonly logger?: Logger;
}

/**
 * Full scoring outcome for one message.
 */
export interface ScoreResult {
    /** The chosen label */
    readonly label: Label;

    /** Final score per label (probability product, or log-probability) */
    readonly scores: Readonly<Record<Label, number>>;

    /** Normalized posterior of the chosen label */
    readonly confidence: number;

    /** Tokens found in the vocabulary */
    readonly matchedTokens: number;

    /** Tokens skipped because they are outside the vocabulary */
    readonly ignoredTokens: number;

    /** True when no label had a strictly greater score */
    readonly tieBreak: boolean;

    /** True when every score is 0 (product) or -Infinity (log) */
    readonly degenerate: boolean;

    readonly scoring: ScoringMode;
}

/**
 * Pick the label with the strictly greatest score.
 *
 * An exact tie goes to DEFAULT_LABEL when it is eligible, otherwise to the
 * first eligible leader. Labels outside `eligible` (those with prior 0)
 * are never returned while an eligible label exists.
 *
 * @param scores - Final score per label
 * @param eligible - Labels that may be chosen (default: all)
 * @returns The winner, with `tie: true` when no label scored strictly highest
 */
export function decide(
    scores: Readonly<Record<Label, number>>,
    eligible: readonly Label[] = LABELS
): { label: Label; tie: boolean } {
    const best    = Math.max(...LABELS.map((label) => scores[label]));
    const leaders = LABELS.filter((label) => scores[label] === best);

    if (leaders.length === 1) {
        return { label: leaders[0], tie: false };
    }

    const candidates = leaders.filter((label) => eligible.includes(label));

    if (candidates.length === 0 || candidates.includes(DEFAULT_LABEL)) {
        return { label: DEFAULT_LABEL, tie: true };
    }

    return { label: candidates[0], tie: true };
}

/**
 * Normalize scores into the posterior of one label.
 *
 * When every score is the mode's zero, the eligible labels share the mass.
 */
function posterior(
    scores: Readonly<Record<Label, number>>,
    label: Label,
    scoring: ScoringMode,
    eligible: readonly Label[]
): number {
    const uniform = eligible.includes(label) ? 1 / eligible.length : 0;

    if (scoring === "log") {
        const best = Math.max(...LABELS.map((l) => scores[l]));
        if (best === -Infinity) {
            return uniform;
        }
        const total = LABELS.reduce((sum, l) => sum + Math.exp(scores[l] - best), 0);
        return Math.exp(scores[label] - best) / total;
    }

    const total = LABELS.reduce((sum, l) => sum + scores[l], 0);
    return total > 0 ? scores[label] / total : uniform;
}

/**
 * Score a message under every label.
 *
 * @param model - Trained model (read only)
 * @param text - Raw message text; an empty string is valid
 * @param options - Scoring mode and logger
 */
export function scoreMessage(
    model: NaiveBayesModel,
    text: string,
    options: ClassifyOptions = {}
): ScoreResult {
    const scoring  = options.scoring ?? "product";
    const tokens   = tokenize(text);
    const eligible = LABELS.filter((label) => model.prior(label) > 0);

    const scores = mapLabels((label) => (scoring === "log" ? Math.log(model.prior(label)) : model.prior(label)));

    let matchedTokens = 0;
    let ignoredTokens = 0;

    for (const token of tokens) {
        const index = model.tokenIndex(token);

        if (index === undefined) {
            ignoredTokens++;
            continue;
        }

        matchedTokens++;

        for (const label of LABELS) {
            const likelihood = model.likelihoodAt(label, index);

            if (scoring === "log") {
                scores[label] += Math.log(likelihood);
            }
            else {
                scores[label] *= likelihood;
            }
        }
    }

    const floor      = scoring === "log" ? -Infinity : 0;
    const degenerate = LABELS.every((label) => scores[label] === floor);
    const { label, tie } = decide(scores, eligible);

    if (degenerate) {
        (options.logger ?? defaultLogger).warn("Every label scored zero; applying tie-break", {
            scoring,
            tokens : tokens.length,
            matchedTokens,
            label,
        });
    }

    return Object.freeze({
        label,
        scores    : Object.freeze(scores),
        confidence: posterior(scores, label, scoring, eligible),
        matchedTokens,
        ignoredTokens,
        tieBreak  : tie,
        degenerate,
        scoring,
    });
}

/**
 * Classify a raw message as spam or ham.
 *
 * Never throws for string input.
 *
 * @example
 * ```typescript
 * classify(model, "CONGRATULATIONS! You won a prize"); // "spam"
 * classify(model, "");                                 // higher prior, or "ham" on equal priors
 * ```
 */
export function classify(model: NaiveBayesModel, text: string, options: ClassifyOptions = {}): Label {
    return scoreMessage(model, text, options).label;
}

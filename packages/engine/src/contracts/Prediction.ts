/**
 * Prediction
 *
 * The result handed to callers that want more than a bare label.
 *
 * Design principles:
 * - Immutable: frozen on creation
 * - Minimal: label, confidence and informational tags
 */

import type { Label } from "./Label.js";

/**
 * Output of a classification.
 *
 * @example
 * ```typescript
 * // Clear spam
 * { type: "spam", confidence: 0.998, tags: ["product-scoring"] }
 *
 * // Empty message against equal priors
 * { type: "ham", confidence: 0.5, tags: ["product-scoring", "tie-break"] }
 * ```
 */
export interface Prediction {
    /**
     * The chosen label.
     */
    readonly type: Label;

    /**
     * Normalized posterior of the chosen label, between 0.0 and 1.0.
     */
    readonly confidence: number;

    /**
     * Informational tags (scoring mode, tie-break, degeneracy).
     * Not used for any decision.
     */
    readonly tags: readonly string[];
}

/**
 * Create a frozen Prediction.
 *
 * @param type - The chosen label
 * @param confidence - Posterior of the chosen label
 * @param tags - Optional informational tags
 */
export function createPrediction(
    type: Label,
    confidence: number,
    tags: readonly string[] = []
): Prediction {
    const prediction: Prediction = {
        type,
        confidence,
        tags: Object.freeze([...tags]),
    };

    return Object.freeze(prediction);
}

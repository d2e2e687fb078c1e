/**
 * @fileoverview InvalidInputError
 *
 * Raised synchronously when a caller violates a precondition of the
 * training boundary. Computation is pure, so there is nothing to retry.
 *
 * @module @spam-bayes/engine/errors/InvalidInputError
 */

/**
 * Which precondition was violated.
 */
export type InvalidInputReason =
    | "empty-training-set"
    | "negative-alpha"
    | "non-finite-alpha"
    | "invalid-label"
    | "invalid-text";

/**
 * Error thrown when training input is unusable.
 *
 * @example
 * ```typescript
 * try {
 *     trainModel([], { alpha: 1 });
 * }
 * catch (error) {
 *     if (error instanceof InvalidInputError && error.reason === "empty-training-set") {
 *         // supply training data
 *     }
 * }
 * ```
 */
export class InvalidInputError extends Error {
    readonly reason: InvalidInputReason;

    constructor(reason: InvalidInputReason, message: string) {
        super(message);
        this.name   = "InvalidInputError";
        this.reason = reason;
    }
}

/**
 * Type guard for InvalidInputError, optionally narrowed to one reason.
 */
export function isInvalidInputError(
    error: unknown,
    reason?: InvalidInputReason
): error is InvalidInputError {
    return error instanceof InvalidInputError && (reason === undefined || error.reason === reason);
}

/**
 * Label Contract
 *
 * The closed set of classes a message can be assigned to.
 * Any other string is rejected at the training boundary.
 */

import { InvalidInputError } from "../errors/InvalidInputError.js";

/**
 * Label values.
 */
export const Label = {
    Spam: "spam",
    Ham : "ham",
} as const;

/**
 * A message class: `"spam"` or `"ham"`.
 */
export type Label = (typeof Label)[keyof typeof Label];

/**
 * Every label, in the fixed order used for iteration and storage.
 */
export const LABELS: readonly Label[] = Object.freeze([Label.Spam, Label.Ham]);

/**
 * Label returned when scores are exactly equal (including an empty message
 * against equal priors, or a score underflow on both sides).
 */
export const DEFAULT_LABEL: Label = Label.Ham;

/**
 * Type guard for Label values.
 */
export function isLabel(value: unknown): value is Label {
    return value === Label.Spam || value === Label.Ham;
}

/**
 * Parse a raw label string.
 *
 * Surrounding whitespace is ignored; the value itself must match exactly.
 *
 * @param raw - The label as read from a dataset
 * @returns The parsed Label
 * @throws InvalidInputError if the value is not a known label
 */
export function parseLabel(raw: string): Label {
    const value = raw.trim();

    if (!isLabel(value)) {
        throw new InvalidInputError(
            "invalid-label",
            `Invalid label "${raw}": expected one of ${LABELS.join(", ")}`
        );
    }

    return value;
}

/**
 * Build a record with one entry per label.
 *
 * @param init - Produces the value for each label
 */
export function mapLabels<T>(init: (label: Label) => T): Record<Label, T> {
    return {
        [Label.Spam]: init(Label.Spam),
        [Label.Ham] : init(Label.Ham),
    };
}

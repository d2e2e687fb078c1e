/**
 * Training data shapes.
 *
 * A LabeledMessage is what callers hand to the trainer. A TrainingExample
 * is the tokenized form owned by the training pipeline and discarded once
 * the model has been estimated.
 */

import type { Label } from "./Label.js";

/**
 * A normalized word produced by the tokenizer.
 */
export type Token = string;

/**
 * Raw labeled message as supplied by a dataset loader.
 */
export interface LabeledMessage {
    /** The message class */
    readonly label: Label;

    /** Raw message text */
    readonly text: string;
}

/**
 * Tokenized training example.
 */
export interface TrainingExample {
    readonly label: Label;

    /** Tokens in message order; repeats are kept */
    readonly tokens: readonly Token[];
}

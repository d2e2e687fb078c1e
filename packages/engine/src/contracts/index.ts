/**
 * @fileoverview Contract barrel exports
 *
 * Labels, training data shapes, predictions and the logger contract.
 *
 * @module @spam-bayes/engine/contracts
 */

// Label contract
export {
    Label,
    LABELS,
    DEFAULT_LABEL,
    isLabel,
    parseLabel,
    mapLabels,
} from "./Label.js";

// Training data
export type {
    Token,
    LabeledMessage,
    TrainingExample,
} from "./TrainingExample.js";

// Prediction
export type { Prediction } from "./Prediction.js";
export { createPrediction } from "./Prediction.js";

// Logger
export type { Logger } from "./Logger.js";
export {
    defaultLogger,
    silentLogger,
    createScopedLogger,
} from "./Logger.js";

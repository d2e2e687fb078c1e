/**
 * @fileoverview Spam Bayes Engine
 *
 * Multinomial Naive Bayes spam/ham classification for short messages.
 *
 * The engine provides:
 * - A deterministic tokenizer shared by training and classification
 * - Vocabulary and per-label frequency aggregation
 * - Laplace-smoothed parameter estimation into an immutable model
 * - Product (default) and log-domain scoring with a fixed Ham tie-break
 *
 * @module @spam-bayes/engine
 * @example
 * ```typescript
 * import { Label, trainModel, classify } from "@spam-bayes/engine";
 *
 * const model = trainModel([
 *     { label: Label.Spam, text: "Claim your FREE prize now" },
 *     { label: Label.Ham, text: "Running late, see you soon" },
 * ]);
 *
 * classify(model, "free prize"); // "spam"
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export {
    Label,
    LABELS,
    DEFAULT_LABEL,
    isLabel,
    parseLabel,
    mapLabels,
    createPrediction,
    defaultLogger,
    silentLogger,
    createScopedLogger,
} from "./contracts/index.js";
export type {
    Token,
    LabeledMessage,
    TrainingExample,
    Prediction,
    Logger,
} from "./contracts/index.js";

export {
    InvalidInputError,
    isInvalidInputError,
    type InvalidInputReason,
} from "./errors/InvalidInputError.js";

// ============================================================================
// Text, training and model exports
// ============================================================================

export { tokenize } from "./text/tokenize.js";

export {
    VocabularyBuilder,
    buildStatistics,
    DEFAULT_ALPHA,
    estimateParameters,
    validateAlpha,
    trainModel,
    type TrainingStatistics,
    type TrainOptions,
} from "./training/index.js";

export {
    NaiveBayesModel,
    type NaiveBayesModelData,
} from "./model/NaiveBayesModel.js";

// ============================================================================
// Inference and evaluation exports
// ============================================================================

export {
    classify,
    decide,
    scoreMessage,
    isScoringMode,
    SCORING_MODES,
    NaiveBayesClassifier,
    type ClassifyOptions,
    type ScoreResult,
    type ScoringMode,
} from "./inference/index.js";

export {
    evaluateModel,
    type ConfusionMatrix,
    type EvaluationReport,
} from "./evaluation/evaluate.js";

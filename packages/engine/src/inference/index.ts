/**
 * @fileoverview Inference barrel exports
 *
 * @module @spam-bayes/engine/inference
 */

export {
    classify,
    decide,
    scoreMessage,
    isScoringMode,
    SCORING_MODES,
    type ClassifyOptions,
    type ScoreResult,
    type ScoringMode,
} from "./classify.js";

export { NaiveBayesClassifier } from "./NaiveBayesClassifier.js";

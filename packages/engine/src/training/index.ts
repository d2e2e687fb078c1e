/**
 * @fileoverview Training barrel exports
 *
 * @module @spam-bayes/engine/training
 */

export {
    VocabularyBuilder,
    buildStatistics,
    type TrainingStatistics,
} from "./VocabularyBuilder.js";

export {
    DEFAULT_ALPHA,
    estimateParameters,
    validateAlpha,
} from "./ParameterEstimator.js";

export { trainModel, type TrainOptions } from "./train.js";

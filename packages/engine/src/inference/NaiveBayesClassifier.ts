/**
 * @fileoverview NaiveBayesClassifier
 *
 * Binds a trained model to a scoring mode and logger.
 *
 * @module @spam-bayes/engine/inference/NaiveBayesClassifier
 */

import type { Label } from "../contracts/Label.js";
import type { Logger } from "../contracts/Logger.js";
import { createPrediction, type Prediction } from "../contracts/Prediction.js";
import type { NaiveBayesModel } from "../model/NaiveBayesModel.js";
import { scoreMessage, type ClassifyOptions, type ScoreResult, type ScoringMode } from "./classify.js";

/**
 * Naive Bayes classifier over a shared, immutable model.
 *
 * Stateless apart from its configuration; one instance may serve any
 * number of callers.
 *
 * @example
 * ```typescript
 * const classifier = new NaiveBayesClassifier(model, { scoring: "log" });
 *
 * classifier.classify("Free entry to win cash"); // "spam"
 * classifier.predict("See you at 6");            // { type: "ham", confidence: 0.97, tags: ["log-scoring"] }
 * ```
 */
export class NaiveBayesClassifier {
    readonly model: NaiveBayesModel;
    readonly scoring: ScoringMode;

    private readonly logger?: Logger;

    constructor(model: NaiveBayesModel, options: ClassifyOptions = {}) {
        this.model   = model;
        this.scoring = options.scoring ?? "product";
        this.logger  = options.logger;
    }

    /**
     * Score a message under every label.
     */
    score(text: string): ScoreResult {
        return scoreMessage(this.model, text, {
            scoring: this.scoring,
            logger : this.logger,
        });
    }

    classify(text: string): Label {
        return this.score(text).label;
    }

    /**
     * Classify several messages. Results are in input order.
     */
    classifyBatch(texts: readonly string[]): Label[] {
        return texts.map((text) => this.classify(text));
    }

    /**
     * Classify a message and describe the outcome as a Prediction.
     */
    predict(text: string): Prediction {
        const result = this.score(text);
        const tags   = [`${result.scoring}-scoring`];

        if (result.tieBreak) {
            tags.push("tie-break");
        }
        if (result.degenerate) {
            tags.push("numeric-degeneracy");
        }

        return createPrediction(result.label, result.confidence, tags);
    }
}

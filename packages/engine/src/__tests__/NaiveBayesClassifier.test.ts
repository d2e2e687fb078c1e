/**
 * @fileoverview Unit tests for NaiveBayesClassifier
 *
 * @module @spam-bayes/engine/__tests__/NaiveBayesClassifier
 */

import { describe, it, expect } from "vitest";
import { NaiveBayesClassifier } from "../inference/NaiveBayesClassifier.js";
import { Label } from "../contracts/Label.js";
import { trainModel } from "../training/train.js";
import { BALANCED_CORPUS, SMALL_CORPUS, createMockLogger } from "./fixtures.js";

describe("NaiveBayesClassifier", () => {
    const model = trainModel(SMALL_CORPUS, { logger: createMockLogger() });

    it("should default to product scoring", () => {
        const classifier = new NaiveBayesClassifier(model);

        expect(classifier.scoring).toBe("product");
        expect(classifier.model).toBe(model);
    });

    it("should classify a single message", () => {
        const classifier = new NaiveBayesClassifier(model);

        expect(classifier.classify("win prize")).toBe(Label.Spam);
        expect(classifier.classify("see you")).toBe(Label.Ham);
    });

    it("should classify a batch in input order", () => {
        const classifier = new NaiveBayesClassifier(model, { scoring: "log" });

        expect(classifier.classifyBatch(["win prize", "see you", ""])).toEqual(["spam", "ham", "ham"]);
    });

    describe("predict", () => {
        it("should return a frozen prediction", () => {
            const prediction = new NaiveBayesClassifier(model).predict("win prize");

            expect(prediction.type).toBe(Label.Spam);
            expect(prediction.confidence).toBeCloseTo(0.88264, 5);
            expect(prediction.tags).toEqual(["product-scoring"]);
            expect(Object.isFrozen(prediction)).toBe(true);
            expect(Object.isFrozen(prediction.tags)).toBe(true);
        });

        it("should tag a tie-break", () => {
            const balanced   = trainModel(BALANCED_CORPUS, { logger: createMockLogger() });
            const prediction = new NaiveBayesClassifier(balanced, { scoring: "log" }).predict("");

            expect(prediction).toEqual({
                type      : "ham",
                confidence: 0.5,
                tags      : ["log-scoring", "tie-break"],
            });
        });

        it("should tag numeric degeneracy and warn through the configured logger", () => {
            const logger     = createMockLogger();
            const underflow  = trainModel([
                { label: Label.Spam, text: "free offer" },
                { label: Label.Ham, text: "hello there" },
            ], { logger });
            const classifier = new NaiveBayesClassifier(underflow, { logger });

            const prediction = classifier.predict(Array.from({ length: 1000 }, () => "free").join(" "));

            expect(prediction.type).toBe(Label.Ham);
            expect(prediction.tags).toEqual(["product-scoring", "tie-break", "numeric-degeneracy"]);
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });
    });
});

/**
 * @fileoverview Unit tests for trainModel
 *
 * Tests cover:
 * - Statistics of the trained model
 * - InvalidInput failures (empty set, negative alpha, bad label, bad text)
 * - Training logs
 *
 * @module @spam-bayes/engine/__tests__/train
 */

import { describe, it, expect } from "vitest";
import { trainModel } from "../training/train.js";
import { InvalidInputError } from "../errors/InvalidInputError.js";
import { Label } from "../contracts/Label.js";
import type { LabeledMessage } from "../contracts/TrainingExample.js";
import { SMALL_CORPUS, catchError, createMockLogger } from "./fixtures.js";

describe("trainModel", () => {
    it("should train a model from labeled messages", () => {
        const model = trainModel(SMALL_CORPUS, { logger: createMockLogger() });

        expect(model.vocabularySize).toBe(10);
        expect(model.totalExamples).toBe(5);
        expect(model.exampleCount(Label.Spam)).toBe(2);
        expect(model.tokenTotal(Label.Spam)).toBe(6);
        expect(model.tokenTotal(Label.Ham)).toBe(9);
        expect(model.alpha).toBe(1);
    });

    it("should tokenize with case and punctuation folding", () => {
        const model = trainModel([
            { label: Label.Spam, text: "WIN!!! Win, win." },
            { label: Label.Ham, text: "ok" },
        ], { logger: createMockLogger() });

        expect(model.vocabulary()).toEqual(["win", "ok"]);
        expect(model.tokenTotal(Label.Spam)).toBe(3);
    });

    it("should pass alpha through to the estimator", () => {
        const model = trainModel(SMALL_CORPUS, { alpha: 2, logger: createMockLogger() });

        expect(model.alpha).toBe(2);
        expect(model.likelihood(Label.Spam, "win")).toBe(5 / 26);
    });

    it("should log training progress", () => {
        const logger = createMockLogger();

        trainModel(SMALL_CORPUS, { logger });

        expect(logger.debug).toHaveBeenCalledWith("Training model", { examples: 5, alpha: 1 });
        expect(logger.info).toHaveBeenCalledWith("Model trained", {
            examples      : 5,
            vocabularySize: 10,
            spamExamples  : 2,
            hamExamples   : 3,
            spamTokens    : 6,
            hamTokens     : 9,
        });
    });

    describe("invalid input", () => {
        it("should fail on an empty training set", () => {
            const error = catchError(() => trainModel([], { logger: createMockLogger() }));

            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error).toMatchObject({ reason: "empty-training-set" });
        });

        it("should fail when alpha is -1", () => {
            const error = catchError(() => trainModel(SMALL_CORPUS, { alpha: -1, logger: createMockLogger() }));

            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error).toMatchObject({
                reason : "negative-alpha",
                message: "Smoothing constant must be >= 0, got -1",
            });
        });

        // Scenario: untyped rows from outside the type system
        it("should fail on a label outside spam/ham", () => {
            const rows: LabeledMessage[] = JSON.parse(
                '[{ "label": "ham", "text": "hi" }, { "label": "promo", "text": "sale" }]'
            );

            const error = catchError(() => trainModel(rows, { logger: createMockLogger() }));

            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error).toMatchObject({
                reason : "invalid-label",
                message: 'Invalid label at index 1: "promo" (expected one of spam, ham)',
            });
        });

        it("should fail on a non-string text", () => {
            const rows: LabeledMessage[] = JSON.parse('[{ "label": "spam", "text": 42 }]');

            const error = catchError(() => trainModel(rows, { logger: createMockLogger() }));

            expect(error).toMatchObject({ reason: "invalid-text" });
        });

        it("should not log a trained model when training fails", () => {
            const logger = createMockLogger();

            catchError(() => trainModel([], { logger }));

            expect(logger.info).not.toHaveBeenCalled();
        });
    });
});

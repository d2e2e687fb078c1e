/**
 * @fileoverview Unit tests for evaluateModel
 *
 * @module @spam-bayes/engine/__tests__/evaluate
 */

import { describe, it, expect } from "vitest";
import { evaluateModel } from "../evaluation/evaluate.js";
import { Label } from "../contracts/Label.js";
import { trainModel } from "../training/train.js";
import { SMS_CORPUS, createMockLogger } from "./fixtures.js";

describe("evaluateModel", () => {
    const model = trainModel(SMS_CORPUS, { logger: createMockLogger() });

    it("should count correct predictions and the confusion matrix", () => {
        const report = evaluateModel(model, [
            { label: Label.Spam, text: "Claim a free secret prize now" },
            { label: Label.Ham, text: "See you at lunch tomorrow" },
            { label: Label.Ham, text: "Thanks for the gift message" },
            { label: Label.Spam, text: "Bort" },
        ]);

        expect(report).toEqual({
            total    : 4,
            correct  : 3,
            accuracy : 0.75,
            confusion: {
                truePositive : 1,
                falsePositive: 0,
                trueNegative : 2,
                falseNegative: 1,
            },
        });
    });

    it("should count ham predicted as spam as a false positive", () => {
        const report = evaluateModel(model, [
            { label: Label.Ham, text: "Congratulations on the secret prize" },
        ]);

        expect(report.confusion.falsePositive).toBe(1);
        expect(report.accuracy).toBe(0);
    });

    it("should report zero accuracy for an empty set", () => {
        const report = evaluateModel(model, []);

        expect(report.total).toBe(0);
        expect(report.accuracy).toBe(0);
    });

    it("should return a frozen report", () => {
        expect(Object.isFrozen(evaluateModel(model, []))).toBe(true);
    });
});

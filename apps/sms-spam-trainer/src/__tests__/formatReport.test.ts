/**
 * @fileoverview Unit tests for report formatting
 *
 * @module report/__tests__/formatReport
 */

import { describe, it, expect } from "vitest";
import { createPrediction, Label, silentLogger, trainModel, type EvaluationReport } from "@spam-bayes/engine";
import { formatAccuracy, formatConfusion, formatPrediction, formatReport } from "../report/formatReport.js";

const REPORT: EvaluationReport = {
    total    : 8,
    correct  : 7,
    accuracy : 0.875,
    confusion: {
        truePositive : 3,
        falsePositive: 1,
        trueNegative : 4,
        falseNegative: 0,
    },
};

describe("formatAccuracy", () => {
    it("should format a percentage with two decimals", () => {
        expect(formatAccuracy(REPORT)).toBe("87.50% (7/8)");
    });

    it("should format an empty evaluation", () => {
        expect(formatAccuracy({ ...REPORT, total: 0, correct: 0, accuracy: 0 })).toBe("0.00% (0/0)");
    });
});

describe("formatConfusion", () => {
    it("should put actual labels in rows and predictions in columns", () => {
        expect(formatConfusion(REPORT)).toEqual([
            "Confusion matrix (rows: actual, columns: predicted)",
            `${" ".repeat(12)}spam${" ".repeat(5)}ham`,
            `  spam${" ".repeat(9)}3${" ".repeat(7)}0`,
            `  ham${" ".repeat(10)}1${" ".repeat(7)}4`,
        ]);
    });
});

describe("formatReport", () => {
    it("should describe the training run", () => {
        const model = trainModel([
            { label: Label.Spam, text: "win cash" },
            { label: Label.Ham, text: "see you" },
            { label: Label.Ham, text: "call me" },
        ], { logger: silentLogger });

        const lines = formatReport({
            model,
            report      : REPORT,
            trainingSize: 3,
            testSize    : 8,
            scoring     : "log",
        });

        expect(lines.slice(0, 6)).toEqual([
            "Training messages: 3 (spam 1, ham 2)",
            "Test messages: 8",
            "Priors: spam 0.3333, ham 0.6667",
            "Vocabulary size: 6",
            "Scoring: log",
            "Accuracy: 87.50% (7/8)",
        ]);
        expect(lines.slice(6)).toEqual(formatConfusion(REPORT));
    });
});

describe("formatPrediction", () => {
    it("should show the label, confidence and text", () => {
        expect(formatPrediction("win a prize", createPrediction(Label.Spam, 0.8826))).toBe("SPAM  88.3%  win a prize");
    });

    it("should pad the ham label to the spam label width", () => {
        expect(formatPrediction("hello", createPrediction(Label.Ham, 0.5))).toBe("HAM   50.0%  hello");
    });
});

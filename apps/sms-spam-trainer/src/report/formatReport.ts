/**
 * @fileoverview Console report
 *
 * @module report/formatReport
 */

import { Label, LABELS, type EvaluationReport, type Prediction } from "@spam-bayes/engine";
import type { TrainerResult } from "../runner.js";

const kLABEL_WIDTH = 6;
const kCELL_WIDTH  = 8;

/**
 * Accuracy as a percentage with two decimals, e.g. "87.50% (7/8)".
 */
export function formatAccuracy(report: EvaluationReport): string {
    return `${(report.accuracy * 100).toFixed(2)}% (${report.correct}/${report.total})`;
}

/**
 * Confusion matrix lines, rows actual and columns predicted.
 */
export function formatConfusion(report: EvaluationReport): string[] {
    const { truePositive, falsePositive, trueNegative, falseNegative } = report.confusion;
    const row = (head: string, cells: readonly (string | number)[]): string =>
        `  ${head.padEnd(kLABEL_WIDTH)}${cells.map((cell) => String(cell).padStart(kCELL_WIDTH)).join("")}`;

    return [
        "Confusion matrix (rows: actual, columns: predicted)",
        row("", LABELS),
        row("spam", [truePositive, falseNegative]),
        row("ham", [falsePositive, trueNegative]),
    ];
}

/**
 * Report lines for a training run.
 */
export function formatReport(result: TrainerResult): string[] {
    const { model, report } = result;

    return [
        `Training messages: ${result.trainingSize} (spam ${model.exampleCount(Label.Spam)}, ham ${model.exampleCount(Label.Ham)})`,
        `Test messages: ${result.testSize}`,
        `Priors: spam ${model.prior(Label.Spam).toFixed(4)}, ham ${model.prior(Label.Ham).toFixed(4)}`,
        `Vocabulary size: ${model.vocabularySize}`,
        `Scoring: ${result.scoring}`,
        `Accuracy: ${formatAccuracy(report)}`,
        ...formatConfusion(report),
    ];
}

/**
 * One line per classified message, e.g. "SPAM  88.3%  win a prize".
 */
export function formatPrediction(text: string, prediction: Prediction): string {
    const label = prediction.type.toUpperCase().padEnd(4);
    return `${label}  ${(prediction.confidence * 100).toFixed(1)}%  ${text}`;
}

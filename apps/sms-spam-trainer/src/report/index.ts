/**
 * @fileoverview Report barrel exports
 *
 * @module report
 */

export {
    formatAccuracy,
    formatConfusion,
    formatReport,
    formatPrediction,
} from "./formatReport.js";

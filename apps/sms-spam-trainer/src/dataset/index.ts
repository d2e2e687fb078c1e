/**
 * @fileoverview Dataset barrel exports
 *
 * @module dataset
 */

export { parseDataset, loadDataset } from "./loadDataset.js";
export {
    splitDataset,
    createRandom,
    type SplitOptions,
    type DatasetSplit,
} from "./splitDataset.js";

/**
 * @fileoverview Dataset Loader
 *
 * Reads labeled messages from a tab-separated text file:
 *
 *     spam<TAB>WINNER!! Claim your prize now
 *     ham<TAB>See you at the station
 *
 * Blank lines and lines starting with # are skipped. Everything after the
 * first tab is the message text, tabs included.
 *
 * @module dataset/loadDataset
 */

import { readFileSync, existsSync } from "fs";
import { parseLabel, type LabeledMessage } from "@spam-bayes/engine";

/**
 * Parse dataset content.
 *
 * @param content - File content
 * @returns Labeled messages in file order
 * @throws Error naming the 1-based line number of the first bad line
 */
export function parseDataset(content: string): LabeledMessage[] {
    const messages: LabeledMessage[] = [];

    content.split(/\r?\n/).forEach((line, index) => {
        const lineNumber = index + 1;

        if (line.trim() === "" || line.startsWith("#")) {
            return;
        }

        const tab = line.indexOf("\t");
        if (tab === -1) {
            throw new Error(`Invalid dataset line ${lineNumber}: expected "<label><TAB><text>"`);
        }

        try {
            messages.push({
                label: parseLabel(line.slice(0, tab)),
                text : line.slice(tab + 1),
            });
        }
        catch (error) {
            throw new Error(
                `Invalid dataset line ${lineNumber}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
    });

    return messages;
}

/**
 * Load a dataset file.
 *
 * @param filePath - Path to the .tsv file
 * @throws Error if the file doesn't exist or a line is invalid
 */
export function loadDataset(filePath: string): LabeledMessage[] {
    if (!existsSync(filePath)) {
        throw new Error(`Dataset file not found: ${filePath}`);
    }

    return parseDataset(readFileSync(filePath, "utf-8"));
}

/**
 * @fileoverview Tokenizer
 *
 * Turns raw message text into normalized word tokens. The same function is
 * used at training and classification time.
 *
 * @module @spam-bayes/engine/text/tokenize
 */

import type { Token } from "../contracts/TrainingExample.js";

/**
 * Anything that is not a letter, a number or an underscore.
 */
const NON_WORD = /[^\p{L}\p{N}_]/gu;

const WHITESPACE = /\s+/;

/**
 * Tokenize a message.
 *
 * 1. Every non-word character becomes a single space
 * 2. The string is lowercased (`toLowerCase`, not the locale-aware variant)
 * 3. The result is split on whitespace runs and empty strings are dropped
 *
 * Repeated words are kept; no stemming or stop-word removal.
 *
 * @example
 * ```typescript
 * tokenize("Call NOW!! Free-prize: call");
 * // => ["call", "now", "free", "prize", "call"]
 * ```
 */
export function tokenize(rawText: string): Token[] {
    return rawText
        .replace(NON_WORD, " ")
        .toLowerCase()
        .split(WHITESPACE)
        .filter((token) => token.length > 0);
}

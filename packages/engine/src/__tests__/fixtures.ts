/**
 * @fileoverview Shared test corpora
 *
 * @module @spam-bayes/engine/__tests__/fixtures
 */

import { vi } from "vitest";
import { Label } from "../contracts/Label.js";
import type { LabeledMessage } from "../contracts/TrainingExample.js";

/**
 * Five short messages with hand-checkable counts.
 *
 * Vocabulary (first-seen order): win, cash, now, prize, see, you, call, me, later, ok
 * Spam tokens: 6 (win×3, cash, now, prize). Ham tokens: 9.
 */
export const SMALL_CORPUS: readonly LabeledMessage[] = [
    { label: Label.Spam, text: "win cash now" },
    { label: Label.Spam, text: "win win prize" },
    { label: Label.Ham, text: "see you now" },
    { label: Label.Ham, text: "call me later" },
    { label: Label.Ham, text: "ok see you" },
];

/**
 * One message per label, so the priors are exactly equal.
 */
export const BALANCED_CORPUS: readonly LabeledMessage[] = [
    { label: Label.Spam, text: "free" },
    { label: Label.Ham, text: "hello" },
];

/**
 * Invented SMS corpus for the end-to-end scenario.
 */
export const SMS_CORPUS: readonly LabeledMessage[] = [
    { label: Label.Spam, text: "Congratulations! You have won a free prize. Call now to claim." },
    { label: Label.Spam, text: "URGENT: you have been selected to receive a cash prize. Reply WIN." },
    { label: Label.Spam, text: "Claim your secret reward today, text PRIZE to 80080." },
    { label: Label.Spam, text: "You are a winner! Free entry into our weekly draw, call 0800 now." },
    { label: Label.Spam, text: "Selected customers get a free gift voucher. Claim now!" },
    { label: Label.Spam, text: "Congratulations, your number was selected for a secret cash bonus." },
    { label: Label.Ham, text: "Thanks for your message, I will call you later." },
    { label: Label.Ham, text: "Are we still meeting for lunch tomorrow?" },
    { label: Label.Ham, text: "I need to pick up more milk from the shop." },
    { label: Label.Ham, text: "Thanks for the gift, the kids loved it." },
    { label: Label.Ham, text: "Can you send me the license details for the car?" },
    { label: Label.Ham, text: "We need to talk about the plates for the party." },
    { label: Label.Ham, text: "Your message made my day, thanks." },
    { label: Label.Ham, text: "The shop closes at six, see you in there." },
    { label: Label.Ham, text: "Do we need more chairs for the meeting?" },
    { label: Label.Ham, text: "Running late, will be home in ten minutes." },
    { label: Label.Ham, text: "Did you get my message about the weekend?" },
    { label: Label.Ham, text: "Happy birthday! Hope you have a great day." },
];

/**
 * Create a mock logger for testing.
 */
export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Run a function that is expected to throw and return what it threw.
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    }
    catch (error) {
        return error;
    }
    throw new Error("Expected function to throw");
}

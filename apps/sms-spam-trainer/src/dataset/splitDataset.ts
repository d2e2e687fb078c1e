/**
 * @fileoverview Train/test split
 *
 * Seeded shuffle followed by a single cut, so a run can be repeated
 * exactly from its seed.
 *
 * @module dataset/splitDataset
 */

export interface SplitOptions {
    /** Share of items that go to training, 0..1 */
    readonly trainFraction: number;

    /** Shuffle seed; only its low 32 bits are used */
    readonly seed: number;
}

export interface DatasetSplit<T> {
    readonly training: T[];
    readonly test: T[];
}

/**
 * mulberry32 generator: uniform floats in [0, 1) from a 32-bit seed.
 * The seed is taken modulo 2^32, so 1 and 2^32 + 1 give the same sequence.
 */
export function createRandom(seed: number): () => number {
    let state = seed >>> 0;

    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t = (t + Math.imul(t ^ (t >>> 7), t | 61)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Shuffle a copy of `items` (Fisher–Yates) and cut it in two.
 *
 * The first `Math.round(items.length * trainFraction)` shuffled items go to
 * training, the rest to test. The input array is not modified.
 *
 * @throws RangeError if trainFraction is outside 0..1
 */
export function splitDataset<T>(items: readonly T[], options: SplitOptions): DatasetSplit<T> {
    const { trainFraction, seed } = options;

    if (!(trainFraction >= 0 && trainFraction <= 1)) {
        throw new RangeError(`trainFraction must be between 0 and 1, got ${trainFraction}`);
    }

    const random   = createRandom(seed);
    const shuffled = [...items];

    for (let i = shuffled.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }

    const cut = Math.round(shuffled.length * trainFraction);

    return {
        training: shuffled.slice(0, cut),
        test    : shuffled.slice(cut),
    };
}

/**
 * Random draws used by game routines. With a seed the sequence is
 * reproducible (xorshift32); without one it falls back to `Math.random`.
 */
export class Random {
    private readonly next: () => number;

    constructor(seed?: number) {
        this.next = seed === undefined ? Math.random : xorshift32(seed);
    }

    /**
     * Uniform over [1, n] for positive n, over [n, -1] for negative n.
     * Zero yields zero.
     */
    random(n: number): number {
        const range = Math.trunc(Math.abs(n));
        if (range === 0) return 0;

        const draw = 1 + Math.floor(this.next() * range);
        return n < 0 ? -draw : draw;
    }

    /**
     * A uniformly chosen element, or `undefined` for an empty sequence.
     */
    pickOne<T>(items: readonly T[]): T | undefined {
        if (items.length === 0) return undefined;
        return items[Math.floor(this.next() * items.length)];
    }

    /**
     * True with probability `percent / 100`.
     */
    prob(percent: number): boolean {
        return Math.floor(this.next() * 100) < percent;
    }
}

function xorshift32(seed: number): () => number {
    // A zero state never leaves zero
    let state = (seed >>> 0) || 0x9e3779b9;
    return () => {
        state ^= state << 13; state >>>= 0;
        state ^= state >>> 17; state >>>= 0;
        state ^= state << 5; state >>>= 0;
        return state / 0x100000000;
    };
}

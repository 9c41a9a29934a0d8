// ═══════════════════════════════════════════════════════════════════════════
// SEEDED PRNG
// ═══════════════════════════════════════════════════════════════════════════

export type RandomSource = () => number

function cyrb128(str: string): readonly [number, number, number, number] {
    let h1: number = 1779033703, h2: number = 3144134277,
        h3: number = 1013904242, h4: number = 2773480762
    for (let i: number = 0, k: number; i < str.length; i++) {
        k = str.charCodeAt(i)
        h1 = h2 ^ Math.imul(h1 ^ k, 597399067)
        h2 = h3 ^ Math.imul(h2 ^ k, 2869860233)
        h3 = h4 ^ Math.imul(h3 ^ k, 951274213)
        h4 = h1 ^ Math.imul(h4 ^ k, 2716044179)
    }
    h1 = Math.imul(h3 ^ (h1 >>> 18), 597399067)
    h2 = Math.imul(h4 ^ (h2 >>> 22), 2869860233)
    h3 = Math.imul(h1 ^ (h3 >>> 17), 951274213)
    h4 = Math.imul(h2 ^ (h4 >>> 19), 2716044179)
    h1 ^= (h2 ^ h3 ^ h4), h2 ^= h1, h3 ^= h1, h4 ^= h1
    return [h1 >>> 0, h2 >>> 0, h3 >>> 0, h4 >>> 0]
}

function sfc32(a: number, b: number, c: number, d: number): RandomSource {
    return () => {
        a |= 0; b |= 0; c |= 0; d |= 0
        const t: number = (a + b | 0) + d | 0
        d = d + 1 | 0
        a = b ^ b >>> 9
        b = c + (c << 3) | 0
        c = (c << 21 | c >>> 11)
        c = c + t | 0
        return (t >>> 0) / 4294967296
    }
}

/**
 * Deterministic uniform source in [0, 1). Same seed, same sequence.
 */
export function seededRandom(seed: number): RandomSource {
    const [a, b, c, d] = cyrb128(String(seed))
    const rng: RandomSource = sfc32(a, b, c, d)
    for (let i: number = 0; i < 15; i++) rng()
    return rng
}

/** Seed for unseeded runs, so a run can still be reproduced from the log. */
export function drawEntropySeed(): number {
    return Math.floor(Math.random() * 2147483647)
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1))
}

/** Uniform float in [min, max). */
export function randomUniform(rng: RandomSource, min: number, max: number): number {
    return min + rng() * (max - min)
}

export function randomChoice<T>(rng: RandomSource, items: readonly [T, ...T[]]): T {
    return items[randomInt(rng, 0, items.length - 1)]
}

/**
 * k distinct items drawn uniformly without replacement (partial Fisher-Yates).
 * Draw order is the returned order.
 */
export function randomSample<T>(rng: RandomSource, items: readonly T[], k: number): readonly T[] {
    const pool: T[] = [...items]
    const count: number = Math.min(k, pool.length)
    for (let i: number = 0; i < count; i++) {
        const j: number = randomInt(rng, i, pool.length - 1)
        const picked: T = pool[j]
        pool[j] = pool[i]
        pool[i] = picked
    }
    return pool.slice(0, count)
}

const SATURATION: number = 0.7
const VALUE: number = 0.9

type Rgb = readonly [number, number, number]

function hsvToRgb(h: number, s: number, v: number): Rgb {
    if (s === 0) {
        return [v, v, v]
    }
    const sector: number = Math.floor(h * 6)
    const f: number = h * 6 - sector
    const p: number = v * (1 - s)
    const q: number = v * (1 - s * f)
    const t: number = v * (1 - s * (1 - f))
    switch (sector % 6) {
        case 0: return [v, t, p]
        case 1: return [q, v, p]
        case 2: return [p, v, t]
        case 3: return [p, q, v]
        case 4: return [t, p, v]
        default: return [v, p, q]
    }
}

function toHexChannel(channel: number): string {
    return Math.floor(channel * 255).toString(16).padStart(2, '0')
}

/**
 * n evenly spaced hues at fixed saturation and value, as `#rrggbb`.
 *
 * @example
 * generateColorPalette(3) // ['#e54444', '#44e544', '#4444e5']
 */
export function generateColorPalette(n: number): readonly string[] {
    return Array.from({ length: n }, (_: unknown, i: number) => {
        const [r, g, b] = hsvToRgb(i / n, SATURATION, VALUE)
        return `#${toHexChannel(r)}${toHexChannel(g)}${toHexChannel(b)}`
    })
}

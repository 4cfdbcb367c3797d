export type Rgb = [number, number, number];
export type RandomSource = () => number;

// the basemap already uses these, keep routes away from them
export const RESERVED_COLORS: Rgb[] = [
    [1, 1, 0],
    [0.5, 0.5, 0],
    [0.878, 0.984, 0.957],
];

const ATTEMPTS = 100;

export function randomColor(pastelFactor: number, random: RandomSource): Rgb {
    const channel = () => (random() + pastelFactor) / (1 + pastelFactor);
    return [channel(), channel(), channel()];
}

export function colorDistance(a: Rgb, b: Rgb): number {
    return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]) + Math.abs(a[2] - b[2]);
}

/** Best of a hundred random tries at a colour far from all the existing ones. */
export function generateNewColor(existing: Rgb[], pastelFactor = 0.5, random: RandomSource = Math.random): Rgb {
    let best: Rgb | undefined;
    let bestDistance = -Infinity;
    for (let i = 0; i < ATTEMPTS; i++) {
        const color = randomColor(pastelFactor, random);
        if (!existing.length) return color;
        const nearest = Math.min(...existing.map(c => colorDistance(color, c)));
        if (nearest > bestDistance) {
            bestDistance = nearest;
            best = color;
        }
    }
    return best ?? randomColor(pastelFactor, random);
}

export function rgbToHex(rgb: Rgb): string {
    return "#" + rgb.map(c => Math.round(Math.min(Math.max(c, 0), 1) * 255).toString(16).padStart(2, "0")).join("");
}

/** Hands out one distinct colour per route and remembers what it gave away. */
export class Palette {
    private readonly used: Rgb[];

    constructor(
        seed: Rgb[] = RESERVED_COLORS,
        private readonly pastelFactor = 0.1,
        private readonly random: RandomSource = Math.random
    ) {
        this.used = seed.slice();
    }

    next(): string {
        const color = generateNewColor(this.used, this.pastelFactor, this.random);
        this.used.push(color);
        return rgbToHex(color);
    }
}

import type { BoundingBox } from '../../types/browser.interface.js';
import { randomBetween, type RandomSource } from '../../utils/timing.js';

export interface HumanizerOptions {
    stepDelayMinMs: number;
    stepDelayMaxMs: number;
    keystrokeDelayMinMs?: number;
    keystrokeDelayMaxMs?: number;
}

export interface Point {
    x: number;
    y: number;
}

// Keep clicks off the element border where hit-testing is unreliable
const EDGE_MARGIN = 0.2;

/**
 * Produces human-looking timing and pointer positions. Pure apart from the random source.
 */
export class Humanizer {
    private readonly keystrokeMin: number;
    private readonly keystrokeMax: number;
    private lastClick: Point | null = null;

    constructor(private readonly options: HumanizerOptions, private readonly random: RandomSource = Math.random) {
        this.keystrokeMin = options.keystrokeDelayMinMs ?? 40;
        this.keystrokeMax = options.keystrokeDelayMaxMs ?? 140;
    }

    /**
     * Pause inserted between interaction steps
     */
    stepDelay(): number {
        return randomBetween(this.options.stepDelayMinMs, this.options.stepDelayMaxMs, this.random);
    }

    keystrokeDelay(): number {
        return randomBetween(this.keystrokeMin, this.keystrokeMax, this.random);
    }

    /**
     * Offset inside `box` (relative to its top-left corner). Never repeats the previous offset exactly.
     */
    clickOffset(box: Pick<BoundingBox, 'width' | 'height'>): Point {
        let point = this.drawOffset(box);
        if (this.lastClick && point.x === this.lastClick.x && point.y === this.lastClick.y) {
            point = { x: point.x + (box.width > 2 ? 1 : 0), y: point.y };
        }
        this.lastClick = point;
        return point;
    }

    private drawOffset(box: Pick<BoundingBox, 'width' | 'height'>): Point {
        const axis = (size: number): number => {
            const usable = size * (1 - 2 * EDGE_MARGIN);
            return Math.round(size * EDGE_MARGIN + this.random() * usable);
        };
        return { x: axis(box.width), y: axis(box.height) };
    }
}

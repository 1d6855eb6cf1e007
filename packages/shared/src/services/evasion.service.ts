import logger from '../utils/logger.js';
import { FingerprintGenerator, type BrowserFingerprint } from '../browser/fingerprint-generator.js';
import { Humanizer, type HumanizerOptions } from '../browser/evasion/humanizer.js';
import { buildStealthScript } from '../browser/evasion/stealth.js';
import type { BoundingBox, ClickOptions, SessionOptions, TypeOptions } from '../types/browser.interface.js';
import { systemClock, type Clock, type RandomSource } from '../utils/timing.js';

export interface SessionProfile {
    fingerprint: BrowserFingerprint;
    options: SessionOptions;
}

export interface EvasionServiceOptions extends HumanizerOptions {
    random?: RandomSource;
    clock?: Clock;
}

/**
 * Anti-detection measures applied at session setup and between interaction steps.
 * Nothing here decides whether a step succeeded.
 */
export class EvasionService {
    private readonly fingerprints: FingerprintGenerator;
    private readonly humanizer: Humanizer;
    private readonly clock: Clock;

    constructor(options: EvasionServiceOptions) {
        const random = options.random ?? Math.random;
        this.fingerprints = new FingerprintGenerator(random);
        this.humanizer = new Humanizer(options, random);
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Fresh fingerprint and the matching context options for one session
     */
    createProfile(): SessionProfile {
        const fingerprint = this.fingerprints.generate();
        logger.debug({ viewport: fingerprint.viewport, platform: fingerprint.platform }, '👻 Session fingerprint drawn');

        return {
            fingerprint,
            options: {
                viewport: fingerprint.viewport,
                userAgent: fingerprint.userAgent,
                locale: fingerprint.locale,
                timezoneId: fingerprint.timezoneId,
                extraHeaders: fingerprint.headers,
                initScript: buildStealthScript(fingerprint.platform)
            }
        };
    }

    /**
     * Randomized pause between interaction steps
     */
    async pauseBetweenSteps(signal?: AbortSignal): Promise<number> {
        const delay = this.humanizer.stepDelay();
        await this.clock.sleep(delay, signal);
        return delay;
    }

    clickOptions(box: BoundingBox | null): ClickOptions {
        if (!box || box.width <= 0 || box.height <= 0) {
            return {};
        }
        return { position: this.humanizer.clickOffset(box), delayMs: this.humanizer.keystrokeDelay() };
    }

    typeOptions(): TypeOptions {
        return { delayMs: this.humanizer.keystrokeDelay() };
    }
}

export function createEvasionService(options: EvasionServiceOptions): EvasionService {
    return new EvasionService(options);
}

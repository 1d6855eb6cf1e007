import type { Viewport } from '../types/browser.interface.js';
import { pick, randomBetween, type RandomSource } from '../utils/timing.js';

export interface BrowserFingerprint {
    userAgent: string;
    viewport: Viewport;
    platform: string;
    locale: string;
    timezoneId: string;
    headers: Record<string, string>;
}

interface OperatingSystem {
    name: string;
    platform: string;
    secChUaPlatform: string;
}

const OPERATING_SYSTEMS: readonly [OperatingSystem, ...OperatingSystem[]] = [
    { name: 'Windows NT 10.0; Win64; x64', platform: 'Win32', secChUaPlatform: '"Windows"' },
    { name: 'Macintosh; Intel Mac OS X 10_15_7', platform: 'MacIntel', secChUaPlatform: '"macOS"' },
    { name: 'X11; Linux x86_64', platform: 'Linux x86_64', secChUaPlatform: '"Linux"' }
];

// Desktop sizes only; search pages switch layout below ~1280px
const RESOLUTIONS: readonly [Viewport, ...Viewport[]] = [
    { width: 1920, height: 1080 },
    { width: 1366, height: 768 },
    { width: 1440, height: 900 },
    { width: 1536, height: 864 },
    { width: 1680, height: 1050 }
];

const TIMEZONES: readonly [string, ...string[]] = [
    'America/New_York',
    'America/Chicago',
    'America/Los_Angeles'
];

const CHROME_MIN_VERSION = 120;
const CHROME_MAX_VERSION = 124;

/**
 * Draws a consistent desktop Chrome profile from fixed pools.
 */
export class FingerprintGenerator {
    constructor(private readonly random: RandomSource = Math.random) { }

    generate(): BrowserFingerprint {
        const os = pick(OPERATING_SYSTEMS, this.random);
        const viewport = pick(RESOLUTIONS, this.random);
        const timezoneId = pick(TIMEZONES, this.random);
        const chromeVersion = randomBetween(CHROME_MIN_VERSION, CHROME_MAX_VERSION, this.random);

        const userAgent = `Mozilla/5.0 (${os.name}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${chromeVersion}.0.0.0 Safari/537.36`;

        // Headers must agree with the user agent or the profile is trivially flagged
        const headers: Record<string, string> = {
            'Accept-Language': 'en-US,en;q=0.9',
            'Upgrade-Insecure-Requests': '1',
            'sec-ch-ua': `"Chromium";v="${chromeVersion}", "Google Chrome";v="${chromeVersion}", "Not-A.Brand";v="99"`,
            'sec-ch-ua-mobile': '?0',
            'sec-ch-ua-platform': os.secChUaPlatform
        };

        return {
            userAgent,
            viewport: { ...viewport },
            platform: os.platform,
            locale: 'en-US',
            timezoneId,
            headers
        };
    }
}

export const VIEWPORT_POOL = RESOLUTIONS;

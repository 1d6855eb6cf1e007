import { chromium, errors, type Browser, type BrowserContext, type ElementHandle, type Page } from 'playwright-core';
import { v4 as uuidv4 } from 'uuid';
import type {
    BoundingBox,
    ClickOptions,
    ElementRef,
    IBrowserDriver,
    IBrowserSession,
    NavigationResponse,
    SessionOptions,
    TypeOptions
} from '../../types/browser.interface.js';
import { FailurePoint, SessionFailure, errorMessage } from '../../types/errors.js';
import logger from '../../utils/logger.js';

export interface PlaywrightDriverOptions {
    headless: boolean;
    /** Connect to an already running Chrome over CDP instead of launching one */
    wsEndpoint?: string;
    executablePath?: string;
}

const CLOSED_PATTERN = /Target (page, context or browser )?(has been )?closed|Browser has been closed|browser has disconnected/i;

function isClosedError(error: unknown): boolean {
    return CLOSED_PATTERN.test(errorMessage(error));
}

/**
 * One Playwright browser context with a single page.
 */
export class PlaywrightSession implements IBrowserSession {
    readonly id = uuidv4();
    private readonly handles = new WeakMap<ElementRef, ElementHandle>();

    constructor(private readonly context: BrowserContext, private readonly page: Page) { }

    async navigate(url: string, timeoutMs: number): Promise<NavigationResponse> {
        const response = await this.guard(() => this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs }));
        return { status: response ? response.status() : null, url: this.page.url() };
    }

    async query(selector: string): Promise<ElementRef | null> {
        const handle = await this.guard(() => this.page.$(selector));
        return handle ? this.track(selector, handle) : null;
    }

    async waitFor(selector: string, timeoutMs: number): Promise<ElementRef | null> {
        try {
            const handle = await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
            return handle ? this.track(selector, handle) : null;
        } catch (error) {
            if (error instanceof errors.TimeoutError) {
                return null;
            }
            throw this.translate(error);
        }
    }

    async isInteractable(element: ElementRef): Promise<boolean> {
        const handle = this.handleFor(element);
        return this.guard(async () => (await handle.isVisible()) && (await handle.isEnabled()));
    }

    async boundingBox(element: ElementRef): Promise<BoundingBox | null> {
        const handle = this.handleFor(element);
        return this.guard(() => handle.boundingBox());
    }

    async type(element: ElementRef, text: string, options: TypeOptions = {}): Promise<void> {
        const handle = this.handleFor(element);
        await this.guard(async () => {
            await handle.click();
            await handle.fill('');
            await handle.type(text, { delay: options.delayMs });
        });
    }

    async press(element: ElementRef, key: string): Promise<void> {
        const handle = this.handleFor(element);
        await this.guard(() => handle.press(key));
    }

    async click(element: ElementRef, options: ClickOptions = {}): Promise<void> {
        const handle = this.handleFor(element);
        await this.guard(() => handle.click({ position: options.position, delay: options.delayMs }));
    }

    async scroll(element: ElementRef | null): Promise<void> {
        if (element) {
            const handle = this.handleFor(element);
            await this.guard(() => handle.scrollIntoViewIfNeeded());
            return;
        }
        await this.guard(() => this.page.evaluate('window.scrollBy(0, Math.round(window.innerHeight * 0.8))'));
    }

    async evaluate<T>(script: string): Promise<T> {
        return this.guard(() => this.page.evaluate<T>(script));
    }

    async content(): Promise<string> {
        return this.guard(() => this.page.content());
    }

    url(): string {
        return this.page.url();
    }

    isClosed(): boolean {
        return this.page.isClosed();
    }

    async dispose(): Promise<void> {
        await this.context.close();
    }

    private track(selector: string, handle: ElementHandle): ElementRef {
        const ref: ElementRef = { selector };
        this.handles.set(ref, handle);
        return ref;
    }

    private handleFor(element: ElementRef): ElementHandle {
        const handle = this.handles.get(element);
        if (!handle) {
            throw new SessionFailure(`Element '${element.selector}' does not belong to session ${this.id}`);
        }
        return handle;
    }

    private async guard<T>(fn: () => Promise<T>): Promise<T> {
        if (this.page.isClosed()) {
            throw new SessionFailure('Page is closed', { sessionId: this.id });
        }
        try {
            return await fn();
        } catch (error) {
            throw this.translate(error);
        }
    }

    private translate(error: unknown): unknown {
        if (this.page.isClosed() || isClosedError(error)) {
            return new SessionFailure(`Browser session lost: ${errorMessage(error)}`, { sessionId: this.id });
        }
        return error;
    }
}

/**
 * Browser driver over playwright-core. One shared Chromium, one context per session.
 */
export class PlaywrightDriver implements IBrowserDriver {
    readonly name = 'playwright';
    private browser: Promise<Browser> | null = null;

    constructor(private readonly options: PlaywrightDriverOptions) { }

    async newSession(options: SessionOptions): Promise<IBrowserSession> {
        try {
            const browser = await this.getBrowser();
            const context = await browser.newContext({
                viewport: options.viewport,
                userAgent: options.userAgent,
                locale: options.locale,
                timezoneId: options.timezoneId,
                extraHTTPHeaders: options.extraHeaders
            });
            if (options.initScript) {
                await context.addInitScript({ content: options.initScript });
            }
            const page = await context.newPage();
            return new PlaywrightSession(context, page);
        } catch (error) {
            throw new SessionFailure(
                `Failed to open browser session: ${errorMessage(error)}`,
                undefined,
                FailurePoint.SESSION_ACQUISITION
            );
        }
    }

    async close(session: IBrowserSession): Promise<void> {
        if (!(session instanceof PlaywrightSession)) {
            logger.warn({ sessionId: session.id }, 'Session was not created by this driver');
            return;
        }
        try {
            await session.dispose();
        } catch (error) {
            // Context already gone together with its browser
            logger.debug({ err: error, sessionId: session.id }, 'Context close failed');
        }
    }

    async shutdown(): Promise<void> {
        const pending = this.browser;
        this.browser = null;
        if (!pending) {
            return;
        }
        const browser = await pending;
        await browser.close();
        logger.info('🔒 Browser closed');
    }

    private getBrowser(): Promise<Browser> {
        if (!this.browser) {
            const launching = this.launch();
            this.browser = launching;
            void launching.catch(() => {
                if (this.browser === launching) {
                    this.browser = null;
                }
            });
        }
        return this.browser;
    }

    private async launch(): Promise<Browser> {
        const browser = this.options.wsEndpoint
            ? await chromium.connectOverCDP(this.options.wsEndpoint)
            : await chromium.launch({
                headless: this.options.headless,
                executablePath: this.options.executablePath,
                args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-blink-features=AutomationControlled']
            });

        browser.on('disconnected', () => {
            logger.warn('⚠️ Browser disconnected unexpectedly');
            this.browser = null;
        });

        logger.info({ remote: Boolean(this.options.wsEndpoint) }, '✅ Browser ready');
        return browser;
    }
}

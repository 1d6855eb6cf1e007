export interface Viewport {
    width: number;
    height: number;
}

export interface SessionOptions {
    viewport: Viewport;
    userAgent: string;
    locale?: string;
    timezoneId?: string;
    extraHeaders?: Record<string, string>;
    /** Installed on the context before any page script runs */
    initScript?: string;
}

export interface NavigationResponse {
    /** HTTP status of the main document, when the driver knows it */
    status: number | null;
    url: string;
}

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Opaque handle to an element inside one session. Only the session that produced it may use it.
 */
export interface ElementRef {
    readonly selector: string;
}

export interface ClickOptions {
    /** Offset inside the element box */
    position?: { x: number; y: number };
    delayMs?: number;
}

export interface TypeOptions {
    delayMs?: number;
}

/**
 * One isolated browsing context (own cookies, storage and viewport).
 */
export interface IBrowserSession {
    readonly id: string;
    navigate(url: string, timeoutMs: number): Promise<NavigationResponse>;
    query(selector: string): Promise<ElementRef | null>;
    /** Resolves null when nothing matched before the timeout */
    waitFor(selector: string, timeoutMs: number): Promise<ElementRef | null>;
    isInteractable(element: ElementRef): Promise<boolean>;
    boundingBox(element: ElementRef): Promise<BoundingBox | null>;
    type(element: ElementRef, text: string, options?: TypeOptions): Promise<void>;
    press(element: ElementRef, key: string): Promise<void>;
    click(element: ElementRef, options?: ClickOptions): Promise<void>;
    scroll(element: ElementRef | null): Promise<void>;
    evaluate<T>(script: string): Promise<T>;
    content(): Promise<string>;
    url(): string;
    isClosed(): boolean;
}

export interface IBrowserDriver {
    readonly name: string;
    newSession(options: SessionOptions): Promise<IBrowserSession>;
    close(session: IBrowserSession): Promise<void>;
    shutdown(): Promise<void>;
}

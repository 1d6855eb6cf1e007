/**
 * Dependency Injection Container
 *
 * - Factory registration (lazy construction)
 * - Singleton and transient lifecycles
 * - Typed tokens
 * - Circular dependency detection
 */

import logger from '../utils/logger.js';
import type { Environment } from '../utils/env-validator.js';
import type { SiteCatalog } from '../automation/site-catalog.js';
import type { IntentClassifier } from '../automation/intent-classifier.js';
import type { PlanCompiler } from '../automation/plan-compiler.js';
import type { ExecutionEngine } from '../automation/execution-engine.js';
import type { ResultExtractor } from '../automation/result-extractor.js';
import type { SelectorResolver } from '../automation/selector-resolver.js';
import type { IBrowserDriver } from '../types/browser.interface.js';
import type { SessionPool } from '../browser/pool.js';
import type { EvasionService } from '../services/evasion.service.js';
import type { IEnrichmentProvider } from '../ai/enrichment.js';

// ============================================
// Types
// ============================================

export type ServiceToken<T> = string & { __type?: T };

export type Lifecycle = 'singleton' | 'transient';

export type Factory<T> = (container: ServiceContainer) => T;

interface ServiceRegistration {
    factory: Factory<unknown>;
    lifecycle: Lifecycle;
    instance?: unknown;
    resolving: boolean;
}

interface Disposable {
    dispose(): void | Promise<void>;
}

function isDisposable(value: unknown): value is Disposable {
    return typeof value === 'object'
        && value !== null
        && 'dispose' in value
        && typeof value.dispose === 'function';
}

// ============================================
// Service Container
// ============================================

export class ServiceContainer {
    private services = new Map<string, ServiceRegistration>();
    private static instance: ServiceContainer | undefined;

    static getInstance(): ServiceContainer {
        if (!ServiceContainer.instance) {
            ServiceContainer.instance = new ServiceContainer();
        }
        return ServiceContainer.instance;
    }

    /**
     * Register a service factory
     */
    registerFactory<T>(
        token: ServiceToken<T>,
        factory: Factory<T>,
        lifecycle: Lifecycle = 'singleton'
    ): void {
        if (this.services.has(token)) {
            logger.warn(`Service ${token} is already registered. Overwriting...`);
        }

        this.services.set(token, {
            factory,
            lifecycle,
            resolving: false
        });

        logger.debug(`DI: Registered ${token} (${lifecycle})`);
    }

    /**
     * Register a service instance (shorthand for singleton with value)
     */
    register<T>(token: ServiceToken<T>, instance: T): void {
        this.registerFactory(token, () => instance, 'singleton');
    }

    /**
     * Resolve a service
     */
    resolve<T>(token: ServiceToken<T>): T {
        const registration = this.services.get(token);

        if (!registration) {
            throw new Error(`Service not found: ${token}. Did you forget to register it?`);
        }

        if (registration.resolving) {
            throw new Error(`Circular dependency detected for service: ${token}`);
        }

        try {
            if (registration.lifecycle === 'singleton') {
                if (registration.instance === undefined) {
                    registration.resolving = true;
                    registration.instance = registration.factory(this);
                    registration.resolving = false;
                }
                // Registration is keyed by the token that carries T
                return registration.instance as T;
            }

            registration.resolving = true;
            const instance = registration.factory(this);
            registration.resolving = false;
            return instance as T;
        } catch (error) {
            registration.resolving = false;
            throw error;
        }
    }

    has<T>(token: ServiceToken<T>): boolean {
        return this.services.has(token);
    }

    getRegisteredServices(): string[] {
        return Array.from(this.services.keys());
    }

    /**
     * Dispose built singletons in reverse registration order, then forget everything
     */
    async dispose(): Promise<void> {
        const registrations = Array.from(this.services.entries()).reverse();
        for (const [token, registration] of registrations) {
            if (isDisposable(registration.instance)) {
                try {
                    await registration.instance.dispose();
                } catch (error) {
                    logger.warn({ err: error, token }, 'Failed to dispose service');
                }
            }
        }
        this.clear();
    }

    /**
     * Forget all registrations without disposing (for testing)
     */
    clear(): void {
        this.services.clear();
        logger.debug('DI: Container cleared');
    }
}

// ============================================
// Global Container Instance
// ============================================

export const container = ServiceContainer.getInstance();

// ============================================
// Helper: Create typed token
// ============================================

export function createToken<T>(name: string): ServiceToken<T> {
    return name as ServiceToken<T>;
}

// ============================================
// Service Tokens (Type-safe)
// ============================================

export const Tokens = {
    Config: createToken<Environment>('Config'),

    // Automation
    SiteCatalog: createToken<SiteCatalog>('SiteCatalog'),
    IntentClassifier: createToken<IntentClassifier>('IntentClassifier'),
    PlanCompiler: createToken<PlanCompiler>('PlanCompiler'),
    SelectorResolver: createToken<SelectorResolver>('SelectorResolver'),
    ResultExtractor: createToken<ResultExtractor>('ResultExtractor'),
    ExecutionEngine: createToken<ExecutionEngine>('ExecutionEngine'),

    // Browser
    BrowserDriver: createToken<IBrowserDriver>('BrowserDriver'),
    SessionPool: createToken<SessionPool>('SessionPool'),
    EvasionService: createToken<EvasionService>('EvasionService'),

    // AI
    EnrichmentProvider: createToken<IEnrichmentProvider>('EnrichmentProvider')
} as const;

// AI
export * from './ai/index.js';

// Automation
export * from './automation/site-catalog.js';
export * from './automation/intent-classifier.js';
export * from './automation/plan-compiler.js';
export * from './automation/selector-resolver.js';
export * from './automation/result-extractor.js';
export * from './automation/execution-engine.js';
export * from './automation/task-status.js';

// Browser & Evasion
export * from './browser/fingerprint-generator.js';
export * from './browser/evasion/humanizer.js';
export * from './browser/evasion/stealth.js';
export * from './browser/adapters/playwright-adapter.js';
export * from './browser/pool.js';

// Services
export * from './services/evasion.service.js';

// Observability
export * from './observability/metrics.js';

// Types
export * from './types/api-response.js';
export * from './types/api-schemas.js';
export * from './types/automation.interface.js';
export * from './types/browser.interface.js';
export * from './types/errors.js';

// Utils
export * from './utils/circuit-breaker.js';
export * from './utils/env-validator.js';
export * from './utils/html-parser.js';
export * from './utils/timing.js';
export { default as logger, contextStorage, withLogContext } from './utils/logger.js';

// DI
export * from './di/container.js';

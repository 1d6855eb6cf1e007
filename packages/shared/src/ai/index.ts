export * from './llm/interfaces.js';
export * from './llm/openai.js';
export * from './enrichment.js';

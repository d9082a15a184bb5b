export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
export { loadConfig, type EngineConfig } from './config.js';
export * from './errors.js';
export { AnalysisEngine, DEFAULT_CONFIDENCE_FLOOR } from './services/AnalysisEngine.js';
export { PredictorAdapter } from './services/PredictorAdapter.js';
export { loadReferenceTables, parseReferenceTables } from './reference/ReferenceTables.js';
export type { ReferenceTables, MaterialProfile } from './reference/ReferenceTables.js';
export { PARAMETER_SCHEMAS } from './reference/parameters.js';
export * from './providers/index.js';
export { ANALYSIS_TYPES } from './types/common.js';
export type * from './types/common.js';
export type * from './types/models.js';
export type * from './types/api.js';

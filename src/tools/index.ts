export * from './base.js';
export * from './registry.js';
export { AproveTool } from './aprove.js';
export { ForestTool } from './forest.js';
export { SymbioticTool } from './symbiotic.js';

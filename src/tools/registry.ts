/**
 * Tool adapter lookup table
 * Adapters are resolved by name once, when a benchmark is loaded
 */

import type { ToolAdapter } from './base.js';
import { AproveTool } from './aprove.js';
import { ForestTool } from './forest.js';
import { SymbioticTool } from './symbiotic.js';
import { Result, Ok, Err } from '../models/index.js';

export type ToolResolver = (name: string) => Result<ToolAdapter, string>;

const TOOLS = new Map<string, () => ToolAdapter>([
  ['aprove', () => new AproveTool()],
  ['forest', () => new ForestTool()],
  ['symbiotic', () => new SymbioticTool()],
]);

export function listToolNames(): string[] {
  return [...TOOLS.keys()].sort();
}

export const createToolAdapter: ToolResolver = (name) => {
  const factory = TOOLS.get(name.toLowerCase());
  if (!factory) {
    return Err(`Unsupported tool '${name}', expected one of: ${listToolNames().join(', ')}`);
  }
  return Ok(factory());
};

/**
 * Zod schemas for benchmark-definition documents
 */

import { z } from 'zod';

// ============================================================================
// Task sets & run definitions
// ============================================================================

export const TaskSetDefinitionSchema = z.object({
  name: z.string().min(1),
  include: z.array(z.string().min(1)).default([]),
  withoutFile: z.array(z.string().min(1)).default([]),
  propertyfile: z.string().min(1).optional(),
  options: z.array(z.string()).default([]),
});

export const RunDefinitionSchema = z.object({
  name: z.string().min(1),
  options: z.array(z.string()).default([]),
});

// ============================================================================
// Benchmark definition
// ============================================================================

export const BenchmarkDefinitionSchema = z
  .object({
    tool: z.string().min(1),
    timelimit: z.number().int().positive().optional(),
    memlimit: z.number().int().positive().optional(),
    cpuCores: z.number().int().positive().optional(),
    options: z.array(z.string()).default([]),
    propertyfile: z.string().min(1).optional(),
    tasks: z.array(TaskSetDefinitionSchema).min(1),
    rundefinitions: z.array(RunDefinitionSchema).min(1).default([{ name: 'default', options: [] }]),
  })
  .superRefine((definition, ctx) => {
    const seen = new Set<string>();
    for (const runDefinition of definition.rundefinitions) {
      if (seen.has(runDefinition.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate run definition '${runDefinition.name}'`,
          path: ['rundefinitions'],
        });
      }
      seen.add(runDefinition.name);
    }
  });

export type TaskSetDefinition = z.infer<typeof TaskSetDefinitionSchema>;
export type RunDefinition = z.infer<typeof RunDefinitionSchema>;
export type BenchmarkDefinition = z.infer<typeof BenchmarkDefinitionSchema>;

/**
 * Configuration schema with validation
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z
  .object({
    files: z.array(z.string().min(1)).min(1).readonly(),
    selectedRunDefinitions: z.array(z.string()).readonly().default([]),
    selectedTaskSets: z.array(z.string()).readonly().default([]),
    name: z.string().min(1).optional(),
    outputPath: z.string().min(1).default('results/'),

    // Resource limits; -1 disables a limit set by the benchmark definition
    timelimit: z.number().int().min(-1).optional(),
    memorylimit: z.number().int().min(-1).optional(),
    corelimit: z.number().int().min(-1).optional(),
    numOfThreads: z.number().int().positive().optional(),
    maxLogfileSize: z.number().int().min(-1).default(20),

    commit: z.boolean().default(false),
    commitMessage: z.string().default('Results for benchmark run'),
    startTime: z.date().optional(),
    debug: z.boolean().default(false),

    logging: z
      .object({
        level: LogLevelSchema.default('info'),
        pretty: z.boolean().default(false),
      })
      .readonly(),
  })
  .readonly();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

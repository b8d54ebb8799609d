import { z } from 'zod';
import { DEPTHS } from '../core/planner.js';
import { ARCHIVE_FORMATS } from '../actions/archive.js';
import { CONFLICT_POLICIES } from '../actions/copy.js';

export const SortCommandOptionsSchema = z.object({
  input: z.array(z.string().min(1)).min(1),
  output: z.string().min(1),
  depth: z.enum(DEPTHS).optional(),
  compress: z.enum(ARCHIVE_FORMATS).optional(),
  onConflict: z.enum(CONFLICT_POLICIES).optional(),
  concurrency: z.coerce.number().int().min(1).max(64).optional(),
  dryRun: z.boolean().default(false),
  yes: z.boolean().default(false),
  config: z.string().optional(),
  debug: z.boolean().default(false),
});

export type SortCommandOptions = z.infer<typeof SortCommandOptionsSchema>;

export const DuplicatesCommandOptionsSchema = z.object({
  input: z.array(z.string().min(1)).min(1),
  config: z.string().optional(),
  debug: z.boolean().default(false),
});

export type DuplicatesCommandOptions = z.infer<typeof DuplicatesCommandOptionsSchema>;

export const InitCommandOptionsSchema = z.object({
  config: z.string().optional(),
  force: z.boolean().default(false),
});

export type InitCommandOptions = z.infer<typeof InitCommandOptionsSchema>;

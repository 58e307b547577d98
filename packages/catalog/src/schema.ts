import { z } from 'zod';
import {
  IndexSnapshotSchema,
  MomentumPointSchema,
  StartupIdSchema,
  StartupStatusSchema,
  StockSchema,
} from '@marketdesk/utils';
import type { Startup } from '@marketdesk/types';

/** Startup as stored on disk; the signal score is derived at load time */
export type StartupEntry = Omit<Startup, 'signalScore'>;

export const StartupEntrySchema: z.ZodType<StartupEntry> = z.object({
  id: StartupIdSchema,
  name: z.string().min(1),
  sector: z.string().min(1),
  stage: z.string().min(1),
  country: z.string(),
  description: z.string(),
  status: StartupStatusSchema,
  overview: z.string(),
  momentum: z.array(MomentumPointSchema),
  notes: z.string(),
});

export const CatalogFileSchema = z.object({
  asOf: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'asOf must be an ISO date (YYYY-MM-DD)'),
  currency: z.string().length(3),
  indices: z.array(IndexSnapshotSchema),
  stocks: z.array(StockSchema),
  startups: z.array(StartupEntrySchema),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

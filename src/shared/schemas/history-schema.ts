/**
 * Zod schema for the persisted history document.
 *
 * Version 1 documents carry no `type`; every entry loads as text.
 * Version 2 adds `type`. Items that do not match are skipped, not fatal.
 *
 * @module shared/schemas/history-schema
 */

import { z } from 'zod';

export const PersistedItemSchema = z.object({
  content: z.string(),
  timestamp: z.number().int(),
  type: z.unknown().optional(),
});

export type PersistedItem = z.infer<typeof PersistedItemSchema>;

export const HistoryDocumentSchema = z.object({
  /** Anything but an integer reads as version 1 */
  version: z.unknown().optional(),
  entries: z.array(z.unknown()).default([]),
});

export type HistoryDocument = z.infer<typeof HistoryDocumentSchema>;

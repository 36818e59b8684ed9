import { z } from 'zod';

const NamedRefSchema = z
  .object({
    id: z.number().optional(),
    name: z.string().nullish(),
  })
  .nullish();

export const TimeEntrySchema = z.object({
  id: z.number(),
  spent_date: z.string().nullish(),
  hours: z.number().nullish(),
  rounded_hours: z.number().nullish(),
  notes: z.string().nullish(),
  billable: z.boolean().nullish(),
  is_billed: z.boolean().nullish(),
  is_locked: z.boolean().nullish(),
  locked_reason: z.string().nullish(),
  billable_rate: z.number().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  user: NamedRefSchema,
  client: NamedRefSchema,
  task: NamedRefSchema,
  project: z
    .object({
      id: z.number().optional(),
      name: z.string().nullish(),
      code: z.string().nullish(),
    })
    .nullish(),
  user_assignment: z
    .object({
      is_active: z.boolean().nullish(),
    })
    .nullish(),
  external_reference: z
    .object({
      permalink: z.string().nullish(),
    })
    .nullish(),
});

export type TimeEntry = z.infer<typeof TimeEntrySchema>;

export const TimeEntriesPageSchema = z.object({
  time_entries: z.array(z.unknown()),
  page: z.number().nullish(),
  next_page: z.number().nullish(),
  total_pages: z.number().nullish(),
  total_entries: z.number().nullish(),
});

export type TimeEntriesPage = z.infer<typeof TimeEntriesPageSchema>;

export interface HarvestCredentials {
  accountId: string;
  authToken: string;
  userAgent: string;
}

/** Raw entries as returned by the API, plus any pages dropped under the skip policy. */
export interface HarvestFetchResult {
  time_entries: unknown[];
  skippedPages: number[];
}

export type PageErrorPolicy = 'abort' | 'skip';

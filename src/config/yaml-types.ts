import { z } from 'zod';

const DepthEntrySchema = z.object({
  max_items: z.number().int().positive(),
  timeout_ms: z.number().int().positive(),
  target_items: z.number().int().positive()
});

export const DepthFileSchema = z.object({
  profiles: z.object({
    quick: DepthEntrySchema.default({ max_items: 10, timeout_ms: 30000, target_items: 8 }),
    default: DepthEntrySchema.default({ max_items: 25, timeout_ms: 60000, target_items: 20 }),
    deep: DepthEntrySchema.default({ max_items: 50, timeout_ms: 120000, target_items: 40 })
  })
});

export type DepthFile = z.infer<typeof DepthFileSchema>;

const unit = z.number().min(0).max(1);

export const ScoringFileSchema = z.object({
  weights: z
    .object({
      relevance: unit.default(0.45),
      recency: unit.default(0.25),
      engagement: unit.default(0.3)
    })
    .default({})
    .refine((w) => Math.abs(w.relevance + w.recency + w.engagement - 1) < 1e-6, {
      message: 'Scoring weights must sum to 1'
    }),
  relevance: z
    .object({
      base: unit.default(0.3),
      boost_step: unit.default(0.1),
      filter_penalty: unit.default(0.25)
    })
    .default({}),
  recency: z
    .object({
      half_life_days: z.number().positive().default(30),
      /** Floor for items older than the window or undated */
      floor: z.number().gt(0).max(1).default(0.05)
    })
    .default({}),
  engagement: z
    .object({
      /** Used when an item carries no engagement signal */
      neutral: unit.default(0.35)
    })
    .default({}),
  entity_weights: z
    .object({
      priority_1: unit.default(0.3),
      priority_2: unit.default(0.15),
      default: unit.default(0.05)
    })
    .default({})
});

export type ScoringFile = z.infer<typeof ScoringFileSchema>;

const EntitySchema = z.object({
  name: z.string().min(1),
  symbol: z.string().optional(),
  aliases: z.array(z.string()).default([])
});

export const DomainFileSchema = z.object({
  domain: z.string().min(1),
  display_name: z.string().optional(),
  entity_types: z.record(z.string(), z.array(EntitySchema)).default({}),
  collectors: z
    .array(
      z.object({
        name: z.string().min(1),
        enabled: z.boolean().default(true),
        /** Lower sorts first on score ties */
        priority: z.number().int().nonnegative().default(100),
        request_delay_ms: z.number().int().nonnegative().optional(),
        http_retries: z.number().int().nonnegative().optional()
      })
    )
    .default([]),
  publications: z
    .array(
      z.object({
        name: z.string().min(1),
        url: z.string().url(),
        rss: z.string().url().optional()
      })
    )
    .default([]),
  scrape_targets: z
    .array(
      z.object({
        name: z.string().min(1),
        url: z.string().url(),
        selector: z.string().min(1),
        title_selector: z.string().optional(),
        link_selector: z.string().optional(),
        snippet_selector: z.string().optional(),
        date_selector: z.string().optional()
      })
    )
    .default([]),
  reports: z.array(z.object({ type: z.string().min(1), description: z.string().optional() })).default([])
});

export type DomainFile = z.infer<typeof DomainFileSchema>;

const FocusSchema = z.object({
  priority_1: z.array(z.string()).default([]),
  priority_2: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  /** Explicit relevance weight per entity name or symbol */
  weights: z.record(z.string(), unit).default({})
});

export const ProfileFileSchema = z.object({
  profile_name: z.string().min(1),
  extends: z.string().optional(),
  focus: z.record(z.string(), FocusSchema).default({}),
  keywords: z
    .object({
      boost: z.array(z.string()).default([]),
      filter: z.array(z.string()).default([])
    })
    .default({}),
  thought_leaders: z
    .array(
      z.object({
        name: z.string().min(1),
        x_handle: z.string().optional(),
        priority: z.number().int().positive().default(3)
      })
    )
    .default([]),
  /** Names of domain publications to follow; empty follows all */
  publications: z.array(z.string()).default([]),
  reports: z.record(z.string(), z.boolean()).default({}),
  require_timestamp: z.boolean().default(false)
});

export type ProfileFile = z.infer<typeof ProfileFileSchema>;

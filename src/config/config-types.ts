import { z } from 'zod'
import { DEFAULT_TOP_CATEGORIES } from '../reporting/types.js'

export const splitwiseConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  /** Groups to fetch; empty means every group of the user */
  groupIds: z.array(z.number().int().positive()).default([]),
  pageSize: z.number().int().min(1).max(1000).default(100),
  /** Ceiling on entries fetched per group */
  maxRecords: z.number().int().positive().optional(),
  timeoutMs: z.number().int().min(1000).max(300_000).default(30_000),
})

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(4),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(30_000),
})

export const driveConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  refreshToken: z.string().min(1),
  folderId: z.string().min(1),
})

export const appConfigSchema = z.object({
  splitwise: splitwiseConfigSchema.default({}),
  retry: retryConfigSchema.default({}),
  /** Remote snapshot store; absent means remote caching and upload are off */
  drive: driveConfigSchema.optional(),
  storage: z
    .object({
      outputDir: z.string().min(1).default('output'),
    })
    .default({}),
  reporting: z
    .object({
      title: z.string().min(1).default('Family Expenses'),
      topCategories: z.number().int().min(1).max(50).default(DEFAULT_TOP_CATEGORIES),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof appConfigSchema>
export type AppConfigInput = z.input<typeof appConfigSchema>
export type DriveConfig = z.infer<typeof driveConfigSchema>

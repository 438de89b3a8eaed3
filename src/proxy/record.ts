import { z } from "zod"

export const endpointRecordSchema = z.object({
  config_string: z.string().min(1),
  protocol: z.string().default("unknown"),
  name: z.string().default(""),
  address: z.string().default(""),
  port: z.number().int().default(443),
  last_test_time: z.number().nonnegative().default(0),
  last_latency: z.number().default(-1),
  success_count: z.number().int().nonnegative().default(0),
  failure_count: z.number().int().nonnegative().default(0),
  tags: z.array(z.string()).default([])
})

const counter = z.number().int().nonnegative().default(0)

/** One file per subscription, `<id>.json`. Older files may list configs as bare descriptor strings. */
export const subscriptionRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  url: z.string().min(1),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(0),
  tags: z.array(z.string()).default([]),
  auto_update: z.boolean().default(false),
  update_interval: z.number().positive().default(86_400),
  last_update_time: z.number().nonnegative().default(0),
  last_fetch_success: z.boolean().default(false),
  last_error_message: z.string().default(""),
  total_updates: counter,
  successful_updates: counter,
  failed_updates: counter,
  configs: z.array(z.union([z.string().min(1), endpointRecordSchema])).default([])
})

export type SubscriptionRecord = z.output<typeof subscriptionRecordSchema>

export function formatZodIssues(error: z.ZodError) {
  return error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ")
}

import { z } from 'zod';

export const defaultApiUrl = 'http://127.0.0.1:31515';

export const taskStatuses = [
  'pending',
  'acknowledged',
  'running',
  'completed',
  'failed',
  'cancelled',
  'expired',
] as const;

export const taskStatusSchema = z.enum(taskStatuses);

export const taskPrioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

export const taskPriorities = {
  low: 1,
  normal: 2,
  high: 3,
  urgent: 4,
} as const;

const jsonObjectSchema = z.record(z.string(), z.unknown());
const identifierListSchema = z.array(z.string().trim().min(1));

export const publishTaskRequestSchema = z.object({
  name: z.string().trim().min(1),
  payload: jsonObjectSchema.default({}),
  priority: taskPrioritySchema.default(2),
  schedule_seconds: z.number().int().positive().nullable().optional(),
  tags: identifierListSchema.default([]),
  timeout_seconds: z.number().positive().nullable().optional(),
  expires_in_seconds: z.number().positive().nullable().optional(),
  depends_on: identifierListSchema.default([]),
  max_retries: z.number().int().nonnegative().default(3),
  callback_url: z.string().trim().url().nullable().optional(),
});

export const submitTaskRequestSchema = publishTaskRequestSchema.omit({ name: true, payload: true }).extend({
  task_type: z.string().trim().min(1),
  action: z.string().trim().min(1),
  params: jsonObjectSchema.default({}),
  context: jsonObjectSchema.nullable().optional(),
  output_format: z.enum(['json', 'markdown', 'html']).default('json'),
  storage_target: z.string().trim().min(1).nullable().optional(),
  notify_on_complete: z.boolean().default(false),
});

const limitQuerySchema = z.coerce.number().int().positive().max(1_000);

export const taskListQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  tag: z
    .union([z.string().trim().min(1), z.array(z.string().trim().min(1))])
    .optional()
    .transform((value) => (value === undefined ? undefined : Array.isArray(value) ? value : [value])),
  priority_min: z.coerce.number().pipe(taskPrioritySchema).optional(),
  limit: limitQuerySchema.optional(),
});

export const readyTasksQuerySchema = z.object({
  limit: limitQuerySchema.optional(),
});

export const taskParamsSchema = z.object({
  task_id: z.string().trim().min(1),
});

export const schedulerJobParamsSchema = z.object({
  name: z.string().trim().min(1),
});

export const taskSchema = z.object({
  task_id: z.string(),
  name: z.string(),
  payload: jsonObjectSchema,
  status: taskStatusSchema,
  priority: taskPrioritySchema,
  created_at: z.string(),
  updated_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  schedule_seconds: z.number().nullable(),
  tags: z.array(z.string()),
  result: jsonObjectSchema.nullable(),
  error: z.string().nullable(),
  retry_count: z.number().int().nonnegative(),
  max_retries: z.number().int().nonnegative(),
  timeout_seconds: z.number().nullable(),
  expires_at: z.string().nullable(),
  depends_on: z.array(z.string()),
  callback_url: z.string().nullable(),
  callback_attempts: z.number().int().nonnegative(),
  callback_last_error: z.string().nullable(),
});

export const taskResponseSchema = z.object({
  task: taskSchema,
});

export const taskListResponseSchema = z.object({
  tasks: z.array(taskSchema),
});

export const taskStatsResponseSchema = z.object({
  total: z.number().int().nonnegative(),
  by_status: z.record(z.string(), z.number().int().nonnegative()),
  by_priority: z.record(z.string(), z.number().int().nonnegative()),
  expired: z.number().int().nonnegative(),
  avg_completion_seconds: z.number().nonnegative(),
});

export const cleanupExpiredResponseSchema = z.object({
  cleaned: z.number().int().nonnegative(),
});

export const schedulerJobSchema = z.object({
  name: z.string(),
  interval_seconds: z.number().int().positive(),
  enabled: z.boolean(),
  last_run_at: z.string().nullable(),
  tags: z.array(z.string()),
  metadata: jsonObjectSchema,
});

export const schedulerJobsResponseSchema = z.object({
  jobs: z.array(schedulerJobSchema),
});

export const triggerSchedulerJobResponseSchema = z.object({
  name: z.string(),
  result: z.unknown(),
});

export const providerHealthSchema = z.object({
  ok: z.boolean(),
  last_error: z.string().nullable(),
  last_checked_at: z.string().nullable(),
});

export const endpointStatsSchema = z.object({
  status: z.enum(['active', 'degraded', 'rate_limited', 'failed']),
  priority: z.number().int(),
  success_count: z.number().int().nonnegative(),
  failure_count: z.number().int().nonnegative(),
  consecutive_failures: z.number().int().nonnegative(),
  success_rate: z.number(),
  avg_latency_seconds: z.number(),
  rate_limit: z.string(),
});

export const providersHealthResponseSchema = z.object({
  providers: z.record(z.string(), providerHealthSchema),
  endpoints: z.record(z.string(), endpointStatsSchema),
});

export const apiErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export type PublishTaskRequest = z.input<typeof publishTaskRequestSchema>;
export type SubmitTaskRequest = z.input<typeof submitTaskRequestSchema>;
export type TaskResponse = z.infer<typeof taskSchema>;
export type TaskStatsResponse = z.infer<typeof taskStatsResponseSchema>;
export type SchedulerJobResponse = z.infer<typeof schedulerJobSchema>;
export type ProvidersHealthResponse = z.infer<typeof providersHealthResponseSchema>;
export type ApiErrorResponse = z.infer<typeof apiErrorResponseSchema>;

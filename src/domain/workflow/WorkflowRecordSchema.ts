import { z } from 'zod';

/**
 * Persisted (snake_case) shape of a workflow record.
 * One JSON document per task; `steps` keeps append order.
 */

const evidenceBundleSchema = z.record(z.string());

export const stepOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success') }),
  z.object({
    status: z.literal('skipped'),
    reason: z.enum(['element not fillable', 'custom ui element']),
  }),
  z.object({
    status: z.literal('error'),
    kind: z.enum(['ElementNotFound', 'ActionExecutionFailed', 'NavigationFailed', 'Unexpected']),
    message: z.string(),
  }),
]);

export const persistedStepSchema = z.object({
  step_number: z.number().int().nonnegative(),
  name: z.string().optional(),
  action_type: z.string().nullable(),
  target: z.string().nullable(),
  value: z.string().nullable(),
  description: z.string(),
  outcome: stepOutcomeSchema,
  screenshots: evidenceBundleSchema.optional(),
  screenshots_before: evidenceBundleSchema.optional(),
  screenshots_after: evidenceBundleSchema.optional(),
  screenshots_error: evidenceBundleSchema.optional(),
  url: z.string().nullable(),
  timestamp: z.string().datetime({ offset: true }),
  state_changed: z.boolean().nullable(),
  duration: z.number().nonnegative().optional(),
  strategy: z.string().optional(),
});

export type PersistedStep = z.infer<typeof persistedStepSchema>;

export const persistedWorkflowSchema = z.object({
  task_id: z.string().min(1),
  query: z.string(),
  app: z.string(),
  action: z.string(),
  entity: z.string(),
  captured_at: z.string().datetime({ offset: true }),
  start_url: z.string(),
  steps: z.array(persistedStepSchema),
});

export type PersistedWorkflow = z.infer<typeof persistedWorkflowSchema>;

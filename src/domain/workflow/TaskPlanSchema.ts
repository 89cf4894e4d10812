import { z } from 'zod';
import { PlanValidationError, errorMessage } from '../errors/AppErrors';
import { TaskPlan } from './StepPlan';

const stepPlanSchema = z
  .object({
    action_type: z
      .string()
      .trim()
      .min(1)
      .transform(type => type.toLowerCase()),
    target: z
      .string()
      .nullish()
      .transform(target => target ?? null),
    /** Wait durations often arrive as numbers */
    value: z
      .union([z.string(), z.number()])
      .nullish()
      .transform(value => (value === null || value === undefined ? null : String(value))),
    description: z.string().default(''),
  })
  .transform(step => ({
    actionType: step.action_type,
    target: step.target,
    value: step.value,
    description: step.description,
  }));

export const taskPlanSchema = z.object({
  app: z.string().default('unknown'),
  action: z.string().default('interact'),
  entity: z.string().default('element'),
  steps: z.array(stepPlanSchema).min(1, 'plan has no steps'),
});

/**
 * Strips a surrounding markdown code fence, as planners replying in text often add.
 */
function unfence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?/, '')
    .replace(/```$/, '')
    .trim();
}

/**
 * Validates planner output, given either as an object or as JSON text.
 * @throws PlanValidationError
 */
export function parseTaskPlan(raw: unknown): TaskPlan {
  let data = raw;

  if (typeof raw === 'string') {
    try {
      data = JSON.parse(unfence(raw));
    } catch (error) {
      throw new PlanValidationError('not valid JSON', [errorMessage(error)]);
    }
  }

  const result = taskPlanSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PlanValidationError(issues[0] ?? 'unknown shape', issues);
  }

  return result.data;
}

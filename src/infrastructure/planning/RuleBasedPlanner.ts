import { PlanRequest, PlannerPort } from '../../application/ports/PlannerPort';
import { fallbackPlan } from '../../application/services/planning/fallbackPlan';
import { getLogger } from '../logging';

const logger = getLogger('Planner');

/**
 * Planner that needs no model: answers every query with the fallback plan,
 * in the same wire shape a model-backed planner returns.
 */
export class RuleBasedPlanner implements PlannerPort {
  async plan(request: PlanRequest): Promise<unknown> {
    const plan = fallbackPlan(request.query, request.appHint ?? 'unknown');
    logger.info('Rule-based plan', { action: plan.action, entity: plan.entity });

    return {
      app: plan.app,
      action: plan.action,
      entity: plan.entity,
      steps: plan.steps.map(step => ({
        action_type: step.actionType,
        target: step.target,
        value: step.value,
        description: step.description,
      })),
    };
  }
}

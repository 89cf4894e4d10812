/**
 * Action types the executor knows how to drive.
 */
export const STEP_ACTION_TYPES = ['click', 'fill', 'hover', 'select_menu', 'wait', 'navigate'] as const;

export type StepActionType = (typeof STEP_ACTION_TYPES)[number];

/**
 * Action types that need an element resolved on the page.
 */
export type ElementActionType = Extract<StepActionType, 'click' | 'fill' | 'hover' | 'select_menu'>;

/**
 * One planned action. `actionType` stays a plain string because planners are
 * fallible; unknown types are logged and dropped by the executor.
 */
export interface StepPlan {
  readonly actionType: string;
  /** Element description or URL */
  readonly target: string | null;
  /** Text to type, wait duration in seconds, or URL */
  readonly value: string | null;
  readonly description: string;
}

/**
 * Planner output for one query.
 */
export interface TaskPlan {
  readonly app: string;
  readonly action: string;
  readonly entity: string;
  readonly steps: readonly StepPlan[];
}

export function isKnownActionType(actionType: string): actionType is StepActionType {
  return STEP_ACTION_TYPES.some(known => known === actionType);
}

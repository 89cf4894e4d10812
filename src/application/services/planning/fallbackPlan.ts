import { TaskPlan } from '../../../domain/workflow/StepPlan';

const CREATE_WORDS = ['create', 'add', 'new'];

const CREATE_ENTITIES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['task', ['task']],
  ['project', ['project']],
  ['page', ['page']],
  ['database', ['database', 'table']],
];

/**
 * Plan used when no planner output is usable: detects the verb and noun of
 * the query and waits once, so the capture still records the starting page.
 */
export function fallbackPlan(query: string, app: string): TaskPlan {
  const lower = query.toLowerCase();
  let action = 'interact';
  let entity = 'element';

  if (CREATE_WORDS.some(word => lower.includes(word))) {
    action = 'create';
    const hit = CREATE_ENTITIES.find(([, words]) => words.some(word => lower.includes(word)));
    if (hit) {
      entity = hit[0];
    }
  } else if (lower.includes('filter')) {
    action = 'filter';
    entity = 'database';
  } else if (lower.includes('search')) {
    action = 'search';
  }

  return {
    app,
    action,
    entity,
    steps: [
      {
        actionType: 'wait',
        target: null,
        value: '1.0',
        description: `preparing to ${action} ${entity}`,
      },
    ],
  };
}

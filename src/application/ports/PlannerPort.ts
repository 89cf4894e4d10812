import { PageContext } from '../../domain/browser/PageContext';

export interface PlanRequest {
  query: string;
  /** Application name or domain the query targets, when known */
  appHint?: string;
  currentUrl: string;
  pageContext: PageContext;
}

/**
 * Turns a natural-language query into a task plan.
 *
 * The output is untrusted: the capture service validates it against the
 * TaskPlan schema and falls back to a rule-based plan when it does not fit.
 */
export interface PlannerPort {
  plan(request: PlanRequest): Promise<unknown>;
}

import { BrowserPort } from '../ports/BrowserPort';
import { PageQueryPort } from '../ports/PageQueryPort';
import { PlanRequest, PlannerPort } from '../ports/PlannerPort';
import { CaptureSummary, WorkflowExecutor } from './WorkflowExecutor';
import { fallbackPlan } from './planning/fallbackPlan';
import { PageContext, emptyPageContext } from '../../domain/browser/PageContext';
import { TaskPlan } from '../../domain/workflow/StepPlan';
import { parseTaskPlan } from '../../domain/workflow/TaskPlanSchema';
import { WorkflowRecord } from '../../domain/workflow/WorkflowRecord';
import { NavigationError, errorMessage } from '../../domain/errors/AppErrors';
import { getLogger } from '../../infrastructure/logging';

export interface CaptureRequest {
  /** Natural-language task, e.g. "create a task called weekly sync" */
  query: string;
  startUrl: string;
  /** Application name passed to the planner */
  appHint?: string;
  /** Defaults to `task_YYYYMMDD_HHMMSS` */
  taskId?: string;
}

export interface WorkflowCaptureDependencies {
  browser: BrowserPort;
  pageQuery: PageQueryPort;
  planner: PlannerPort;
  executor: WorkflowExecutor;
}

export interface WorkflowCaptureOptions {
  /** Network-idle wait after opening the start URL (default: 3000) */
  initialSettleMs?: number;
  now?: () => Date;
}

const logger = getLogger('Capture');

/**
 * Entry point of a capture: opens the start page, gets a plan for the query
 * and runs it.
 *
 * Only a failure to open the start page rejects. Planner failures fall back
 * to a rule-based plan, and step failures end up in the record.
 */
export class WorkflowCaptureService {
  private readonly initialSettleMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly deps: WorkflowCaptureDependencies,
    options: WorkflowCaptureOptions = {}
  ) {
    this.initialSettleMs = options.initialSettleMs ?? 3000;
    this.now = options.now ?? (() => new Date());
  }

  async capture(request: CaptureRequest): Promise<CaptureSummary> {
    const { browser } = this.deps;
    const startedAt = this.now();
    const taskId = request.taskId ?? defaultTaskId(startedAt);

    logger.info('Opening start page', { taskId, url: request.startUrl });
    const navigation = await browser.navigate(request.startUrl);
    if (!navigation.success) {
      throw new NavigationError(request.startUrl, navigation.error);
    }
    await browser.waitForStability(this.initialSettleMs);

    const currentUrl = await browser.getCurrentUrl();
    const pageContext = await this.readContext(currentUrl);
    const plan = await this.obtainPlan({
      query: request.query,
      appHint: request.appHint,
      currentUrl,
      pageContext,
    });

    logger.info('Plan ready', {
      taskId,
      app: plan.app,
      action: plan.action,
      entity: plan.entity,
      steps: plan.steps.length,
    });

    const record = WorkflowRecord.create(
      taskId,
      {
        query: request.query,
        app: plan.app,
        action: plan.action,
        entity: plan.entity,
        startUrl: request.startUrl,
      },
      startedAt
    );

    return this.deps.executor.execute(record, plan.steps);
  }

  private async readContext(url: string): Promise<PageContext> {
    try {
      return await this.deps.pageQuery.readPageContext();
    } catch (error) {
      logger.warn('Could not read page context', { error: errorMessage(error) });
      return emptyPageContext(url);
    }
  }

  private async obtainPlan(request: PlanRequest): Promise<TaskPlan> {
    try {
      return parseTaskPlan(await this.deps.planner.plan(request));
    } catch (error) {
      logger.warn('Planner output unusable, using fallback plan', { error: errorMessage(error) });
      return fallbackPlan(request.query, request.appHint ?? 'unknown');
    }
  }
}

/**
 * `task_YYYYMMDD_HHMMSS` in local time.
 */
export function defaultTaskId(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `task_${day}_${time}`;
}

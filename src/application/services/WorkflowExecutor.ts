import { BrowserPort } from '../ports/BrowserPort';
import { ElementHandle, PageQueryPort } from '../ports/PageQueryPort';
import { EvidencePort } from '../ports/EvidencePort';
import { WorkflowRepository } from '../ports/WorkflowRepository';
import { ElementResolver } from './resolution/ElementResolver';
import { StateSignatureService } from './StateSignatureService';
import { Sleep, realSleep } from './timing';
import {
  CaptureState,
  isTerminalCaptureState,
  isValidCaptureTransition,
} from '../../domain/workflow/CaptureState';
import {
  ElementActionType,
  StepActionType,
  StepPlan,
  isKnownActionType,
} from '../../domain/workflow/StepPlan';
import {
  EvidenceBundle,
  SkipReason,
  StepErrorKind,
  StepEvidence,
  StepResult,
} from '../../domain/workflow/StepResult';
import { WorkflowRecord } from '../../domain/workflow/WorkflowRecord';
import {
  ActionExecutionError,
  ElementNotFoundError,
  NavigationError,
  errorMessage,
} from '../../domain/errors/AppErrors';
import { getLogger } from '../../infrastructure/logging';

export interface WorkflowExecutorDependencies {
  browser: BrowserPort;
  pageQuery: PageQueryPort;
  resolver: ElementResolver;
  signatures: StateSignatureService;
  evidence: EvidencePort;
  repository: WorkflowRepository;
}

export interface WorkflowExecutorOptions {
  /** Consecutive step errors that halt the run (default: 2) */
  maxConsecutiveErrors?: number;
  /** Delay before retrying an unresolved target in menu context (default: 500) */
  menuRetryDelayMs?: number;
  /** Delay before checking whether a click opened a menu (default: 500) */
  menuProbeDelayMs?: number;
  /** Upper bound for the post-action state change wait (default: 3000) */
  settleTimeoutMs?: number;
  /** Poll interval for the state change wait (default: 500) */
  pollIntervalMs?: number;
  /** Network-idle wait after every element action (default: 3000) */
  stabilityTimeoutMs?: number;
  /** Pause after a failed step before the next one (default: 1000) */
  errorPauseMs?: number;
  /** Seconds a wait step lasts without a value (default: 1.0) */
  defaultWaitSeconds?: number;
  /** Text typed by fill steps without a value (default: 'sample text') */
  defaultFillText?: string;
  sleep?: Sleep;
}

export interface CaptureSummary {
  state: CaptureState;
  record: WorkflowRecord;
  /** Where the repository wrote the record */
  savedTo: string;
}

type ResolvedOptions = Required<Omit<WorkflowExecutorOptions, 'sleep'>>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  maxConsecutiveErrors: 2,
  menuRetryDelayMs: 500,
  menuProbeDelayMs: 500,
  settleTimeoutMs: 3000,
  pollIntervalMs: 500,
  stabilityTimeoutMs: 3000,
  errorPauseMs: 1000,
  defaultWaitSeconds: 1.0,
  defaultFillText: 'sample text',
};

const MENU_DESCRIPTION_WORDS = ['menu', 'option', 'from'];

const logger = getLogger('Executor');

/**
 * Lifecycle and error streak of one run.
 */
class CaptureRun {
  private current: CaptureState = CaptureState.INIT;
  consecutiveErrors = 0;

  get state(): CaptureState {
    return this.current;
  }

  transitionTo(next: CaptureState): void {
    if (!isValidCaptureTransition(this.current, next)) {
      throw new Error(`Invalid capture transition: ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}

/**
 * Outcome of the element-bound part of a step, before it becomes a StepResult.
 */
type ElementStepOutcome =
  | { status: 'success'; strategy: string; stateChanged: boolean }
  | { status: 'skipped'; reason: SkipReason };

/**
 * Drives a planned step list against the page and records what happened.
 *
 * Every step ends as a StepResult: resolution and action failures become
 * Error outcomes, and two known fill situations become Skipped outcomes.
 * Only Error outcomes count toward the circuit breaker.
 */
export class WorkflowExecutor {
  private readonly options: ResolvedOptions;
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: WorkflowExecutorDependencies,
    options: WorkflowExecutorOptions = {}
  ) {
    this.options = {
      maxConsecutiveErrors: options.maxConsecutiveErrors ?? DEFAULT_OPTIONS.maxConsecutiveErrors,
      menuRetryDelayMs: options.menuRetryDelayMs ?? DEFAULT_OPTIONS.menuRetryDelayMs,
      menuProbeDelayMs: options.menuProbeDelayMs ?? DEFAULT_OPTIONS.menuProbeDelayMs,
      settleTimeoutMs: options.settleTimeoutMs ?? DEFAULT_OPTIONS.settleTimeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_OPTIONS.pollIntervalMs,
      stabilityTimeoutMs: options.stabilityTimeoutMs ?? DEFAULT_OPTIONS.stabilityTimeoutMs,
      errorPauseMs: options.errorPauseMs ?? DEFAULT_OPTIONS.errorPauseMs,
      defaultWaitSeconds: options.defaultWaitSeconds ?? DEFAULT_OPTIONS.defaultWaitSeconds,
      defaultFillText: options.defaultFillText ?? DEFAULT_OPTIONS.defaultFillText,
    };
    this.sleep = options.sleep ?? realSleep;
  }

  async execute(record: WorkflowRecord, steps: readonly StepPlan[]): Promise<CaptureSummary> {
    const run = new CaptureRun();
    const taskId = record.taskId;

    logger.info('Starting capture', { taskId, steps: steps.length });

    const initialEvidence = await this.capture('initial_state', taskId, 'initial page view');
    record.append(StepResult.initialState((await this.currentUrl()) ?? record.startUrl, initialEvidence));
    run.transitionTo(CaptureState.RUNNING);

    for (const [index, plan] of steps.entries()) {
      const actionType = plan.actionType;
      if (!isKnownActionType(actionType)) {
        logger.warn('Unknown action type, step ignored', {
          actionType,
          description: plan.description,
        });
        continue;
      }

      const result = await this.executeStep(plan, actionType, record.nextStepNumber, taskId);
      record.append(result);
      logger.info(result.summarize());

      if (!result.isError()) {
        run.consecutiveErrors = 0;
        continue;
      }

      run.consecutiveErrors++;
      if (run.consecutiveErrors >= this.options.maxConsecutiveErrors) {
        logger.warn('Too many consecutive errors, halting capture', {
          taskId,
          consecutiveErrors: run.consecutiveErrors,
          remainingSteps: steps.length - index - 1,
        });
        run.transitionTo(CaptureState.HALTED_BY_CIRCUIT_BREAKER);
        break;
      }

      await this.sleep(this.options.errorPauseMs);
    }

    if (!isTerminalCaptureState(run.state)) {
      run.transitionTo(CaptureState.COMPLETED);
    }

    const savedTo = await this.deps.repository.save(record);
    const tally = record.tally();
    logger.info('Capture finished', { taskId, state: run.state, ...tally, savedTo });

    return { state: run.state, record, savedTo };
  }

  private executeStep(
    plan: StepPlan,
    actionType: StepActionType,
    stepNumber: number,
    taskId: string
  ): Promise<StepResult> {
    switch (actionType) {
      case 'wait':
        return this.executeWait(plan, stepNumber);
      case 'navigate':
        return this.executeNavigate(plan, stepNumber, taskId);
      default:
        return this.executeElementStep(plan, actionType, stepNumber, taskId);
    }
  }

  private async executeWait(plan: StepPlan, stepNumber: number): Promise<StepResult> {
    const seconds = this.parseWaitSeconds(plan.value);
    await this.deps.browser.wait(seconds * 1000);

    return StepResult.create({
      ...this.planFields(plan, stepNumber),
      outcome: { status: 'success' },
      evidence: {},
      url: await this.currentUrl(),
      stateChanged: null,
      duration: seconds,
    });
  }

  private async executeNavigate(plan: StepPlan, stepNumber: number, taskId: string): Promise<StepResult> {
    const url = plan.value || plan.target;

    try {
      if (!url) {
        throw new NavigationError('(none)', 'no URL given');
      }

      const result = await this.deps.browser.navigate(url);
      if (!result.success) {
        throw new NavigationError(url, result.error);
      }
      await this.deps.browser.waitForStability(this.options.stabilityTimeoutMs);

      const state = await this.capture(`step_${stepNumber}_navigate`, taskId, plan.description);
      return StepResult.create({
        ...this.planFields(plan, stepNumber),
        outcome: { status: 'success' },
        evidence: { state },
        url: await this.currentUrl(),
        stateChanged: null,
      });
    } catch (error) {
      return this.errorResult(plan, stepNumber, taskId, error, {});
    }
  }

  private async executeElementStep(
    plan: StepPlan,
    actionType: ElementActionType,
    stepNumber: number,
    taskId: string
  ): Promise<StepResult> {
    const evidence: StepEvidence = {};

    try {
      const outcome = await this.performElementAction(plan, actionType, stepNumber, taskId, evidence);

      if (outcome.status === 'skipped') {
        logger.info('Step skipped', { stepNumber, reason: outcome.reason });
        return StepResult.create({
          ...this.planFields(plan, stepNumber),
          outcome,
          evidence,
          url: await this.currentUrl(),
          stateChanged: null,
        });
      }

      evidence.after = await this.capture(`step_${stepNumber}_Bafter`, taskId, plan.description);

      return StepResult.create({
        ...this.planFields(plan, stepNumber),
        outcome: { status: 'success' },
        evidence,
        url: await this.currentUrl(),
        stateChanged: outcome.stateChanged,
        strategy: outcome.strategy,
      });
    } catch (error) {
      return this.errorResult(plan, stepNumber, taskId, error, evidence);
    }
  }

  /**
   * Resolve, act, and settle. Fills `evidence.before` as it goes so a later
   * failure still carries it.
   */
  private async performElementAction(
    plan: StepPlan,
    actionType: ElementActionType,
    stepNumber: number,
    taskId: string,
    evidence: StepEvidence
  ): Promise<ElementStepOutcome> {
    const { browser, pageQuery, resolver, signatures } = this.deps;
    const target = plan.target?.trim() || plan.description.trim();
    if (!target) {
      if (actionType === 'fill') {
        return { status: 'skipped', reason: 'element not fillable' };
      }
      throw new ElementNotFoundError('(empty target)');
    }

    const context = await pageQuery.readPageContext();
    const description = plan.description.toLowerCase();
    const menuContext =
      actionType === 'select_menu' ||
      MENU_DESCRIPTION_WORDS.some(word => description.includes(word)) ||
      context.uiState.hasMenu;

    let resolution = await resolver.resolve(target, undefined, menuContext);
    if (!resolution.found && menuContext) {
      logger.debug('Retrying in menu context', { target });
      await this.sleep(this.options.menuRetryDelayMs);
      resolution = await resolver.resolve(target, undefined, true);
    }

    if (!resolution.found) {
      if (actionType === 'fill') {
        return { status: 'skipped', reason: 'element not fillable' };
      }
      throw new ElementNotFoundError(target);
    }

    const { handle, strategy } = resolution;
    evidence.before = await this.capture(`step_${stepNumber}_Abefore`, taskId, plan.description, handle);
    const beforeAction = await signatures.signature();

    switch (actionType) {
      case 'click':
      case 'select_menu':
        await this.click(handle, actionType, target);
        break;
      case 'fill': {
        const filled = await this.fill(handle, plan.value || this.options.defaultFillText);
        if (!filled) {
          return { status: 'skipped', reason: 'custom ui element' };
        }
        break;
      }
      case 'hover': {
        const result = await browser.hover(handle);
        if (!result.success) {
          throw new ActionExecutionError(actionType, target, result.error);
        }
        break;
      }
    }

    if ((actionType === 'click' || actionType === 'select_menu') && !menuContext) {
      await this.sleep(this.options.menuProbeDelayMs);
      const afterClick = await pageQuery.readPageContext();
      if (afterClick.uiState.hasMenu) {
        const menu = await this.capture(`step_${stepNumber}_menu`, taskId, 'menu opened');
        evidence.before = { ...evidence.before, ...prefixKeys('menu_', menu) };
      }
    }

    // A change that lands before the settle wait starts is already in its reference
    const stateChanged =
      (await signatures.waitForChange(this.options.settleTimeoutMs, this.options.pollIntervalMs)) ||
      (await signatures.signature()) !== beforeAction;
    await browser.waitForStability(this.options.stabilityTimeoutMs);

    return { status: 'success', strategy, stateChanged };
  }

  private async click(handle: ElementHandle, actionType: ElementActionType, target: string): Promise<void> {
    const { browser } = this.deps;

    let result = await browser.click(handle);
    if (!result.success) {
      logger.debug('Click failed, retrying with force', { target, error: result.error });
      result = await browser.click(handle, { force: true });
    }
    if (!result.success) {
      throw new ActionExecutionError(actionType, target, result.error);
    }
  }

  /**
   * Clear-and-type, falling back to keyboard editing for editable regions that
   * are not form inputs. Returns false when neither works.
   */
  private async fill(handle: ElementHandle, text: string): Promise<boolean> {
    const { browser } = this.deps;

    const direct = await browser.fill(handle, text);
    if (direct.success) {
      return true;
    }

    logger.debug('Fill failed, typing into element instead', { handle: handle.label, error: direct.error });
    const sequence = [
      () => browser.click(handle),
      () => browser.pressKey('Control+a'),
      () => browser.pressKey('Backspace'),
      () => browser.typeText(text),
    ];

    for (const action of sequence) {
      const result = await action();
      if (!result.success) {
        logger.info('Element does not accept typed text', { handle: handle.label, error: result.error });
        return false;
      }
    }
    return true;
  }

  private async errorResult(
    plan: StepPlan,
    stepNumber: number,
    taskId: string,
    error: unknown,
    evidence: StepEvidence
  ): Promise<StepResult> {
    const message = errorMessage(error);
    logger.error('Step failed', { stepNumber, actionType: plan.actionType, error: message });

    let captured: EvidenceBundle = {};
    try {
      captured = await this.deps.evidence.captureErrorState(`step_${stepNumber}_error`, taskId, message);
    } catch (captureError) {
      logger.warn('Error evidence capture failed', { stepNumber, error: errorMessage(captureError) });
    }

    return StepResult.create({
      ...this.planFields(plan, stepNumber),
      outcome: { status: 'error', kind: errorKind(error), message },
      evidence: { ...evidence, error: captured },
      url: await this.currentUrl(),
      stateChanged: null,
    });
  }

  /**
   * Best-effort evidence: failures are logged and yield an empty bundle.
   */
  private async capture(
    stepName: string,
    taskId: string,
    annotation?: string,
    highlight?: ElementHandle
  ): Promise<EvidenceBundle> {
    try {
      return await this.deps.evidence.captureState(stepName, taskId, annotation, highlight);
    } catch (error) {
      logger.warn('Evidence capture failed', { stepName, error: errorMessage(error) });
      return {};
    }
  }

  private async currentUrl(): Promise<string | null> {
    try {
      return await this.deps.browser.getCurrentUrl();
    } catch (error) {
      logger.warn('Could not read current URL', { error: errorMessage(error) });
      return null;
    }
  }

  private parseWaitSeconds(value: string | null): number {
    if (value === null || value.trim() === '') {
      return this.options.defaultWaitSeconds;
    }
    const seconds = Number.parseFloat(value);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds : this.options.defaultWaitSeconds;
  }

  private planFields(plan: StepPlan, stepNumber: number) {
    return {
      stepNumber,
      actionType: plan.actionType,
      target: plan.target,
      value: plan.value,
      description: plan.description,
    };
  }
}

function errorKind(error: unknown): StepErrorKind {
  if (error instanceof ElementNotFoundError) return 'ElementNotFound';
  if (error instanceof ActionExecutionError) return 'ActionExecutionFailed';
  if (error instanceof NavigationError) return 'NavigationFailed';
  return 'Unexpected';
}

function prefixKeys(prefix: string, bundle: EvidenceBundle): EvidenceBundle {
  return Object.fromEntries(Object.entries(bundle).map(([key, path]) => [`${prefix}${key}`, path]));
}

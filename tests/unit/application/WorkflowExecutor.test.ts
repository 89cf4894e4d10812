import { WorkflowExecutor, WorkflowExecutorOptions } from '../../../src/application/services/WorkflowExecutor';
import { ElementResolver } from '../../../src/application/services/resolution/ElementResolver';
import { StateSignatureService } from '../../../src/application/services/StateSignatureService';
import { CaptureState } from '../../../src/domain/workflow/CaptureState';
import { StepPlan } from '../../../src/domain/workflow/StepPlan';
import { WorkflowRecord } from '../../../src/domain/workflow/WorkflowRecord';
import { FakeNode, FakePage } from '../../support/FakePage';
import { InMemoryWorkflowRepository } from '../../support/InMemoryWorkflowRepository';
import { fakeClock } from '../../support/clock';

const TASK_ID = 'task_20240501_093000';

function setup(page: FakePage, options: WorkflowExecutorOptions = {}) {
  const clock = fakeClock();
  const repository = new InMemoryWorkflowRepository();
  const executor = new WorkflowExecutor(
    {
      browser: page,
      pageQuery: page,
      resolver: new ElementResolver(page, { menuRenderDelayMs: 0, sleep: clock.sleep }),
      signatures: new StateSignatureService(page, clock),
      evidence: page,
      repository,
    },
    { sleep: clock.sleep, ...options }
  );
  const record = WorkflowRecord.create(TASK_ID, {
    query: 'create a task',
    app: 'tracker',
    action: 'create',
    entity: 'task',
    startUrl: 'https://app.test/home',
  });
  return { executor, record, repository, clock };
}

const step = (actionType: string, target: string | null, value: string | null = null, description = ''): StepPlan => ({
  actionType,
  target,
  value,
  description: description || `${actionType} ${target ?? ''}`.trim(),
});

const buttons = (): FakePage =>
  new FakePage([
    { tag: 'button', text: 'Save' },
    { tag: 'button', text: 'Cancel' },
  ]);

describe('WorkflowExecutor', () => {
  describe('initial state', () => {
    it('should record step 0 before any planned step', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('wait', null, '0')]);

      const initial = summary.record.steps[0];
      expect(initial.stepNumber).toBe(0);
      expect(initial.name).toBe('initial_state');
      expect(initial.url).toBe('https://app.test/home');
      expect(initial.evidence).toEqual({ state: { viewport: `${TASK_ID}/initial_state.png` } });
    });
  });

  describe('menu workflow', () => {
    it('should open a menu, wait, and pick the item', async () => {
      const page = new FakePage();
      const menu: FakeNode[] = [
        { tag: 'div', role: 'menu' },
        { tag: 'div', role: 'menuitem', text: 'Task', onClick: (p: FakePage) => closeMenu(p) },
        { tag: 'div', role: 'menuitem', text: 'Project' },
      ];
      const closeMenu = (p: FakePage): void => {
        p.nodes = p.nodes.filter(node => !menu.includes(node));
      };
      page.add({
        tag: 'button',
        text: 'Create',
        onClick: p => p.add(...menu),
      });
      const { executor, record, repository } = setup(page);

      const summary = await executor.execute(record, [
        step('click', 'Create', null, 'click Create'),
        step('wait', '', '0.5', 'wait for the menu'),
        step('select_menu', 'Task', null, 'select Task'),
      ]);

      expect(summary.state).toBe(CaptureState.COMPLETED);
      expect(summary.record.stepCount).toBe(4);
      expect(page.actions).toEqual(['click:Create', 'click:Task']);

      const [, click, wait, select] = summary.record.steps;
      expect(click.outcome).toEqual({ status: 'success' });
      expect(click.strategy).toBe('exact_text');
      expect(click.stateChanged).toBe(true);
      expect(click.evidence).toEqual({
        before: {
          viewport: `${TASK_ID}/step_1_Abefore.png`,
          menu_viewport: `${TASK_ID}/step_1_menu.png`,
        },
        after: { viewport: `${TASK_ID}/step_1_Bafter.png` },
      });

      expect(wait.duration).toBe(0.5);
      expect(page.waits).toEqual([500]);

      expect(select.outcome).toEqual({ status: 'success' });
      expect(select.strategy).toBe('menu');
      expect(select.stateChanged).toBe(true);

      expect(summary.savedTo).toBe(`/captures/${TASK_ID}/workflow.json`);
      expect(repository.records.get(TASK_ID)).toBe(record);
    });
  });

  describe('circuit breaker', () => {
    it('should halt after two consecutive errors', async () => {
      const page = buttons();
      const { executor, record, repository } = setup(page);

      const summary = await executor.execute(record, [
        step('click', 'Save'),
        step('click', 'Cancel'),
        step('click', 'Archive'),
        step('click', 'Export'),
        step('click', 'Save'),
      ]);

      expect(summary.state).toBe(CaptureState.HALTED_BY_CIRCUIT_BREAKER);
      expect(summary.record.stepCount).toBe(5);
      expect(summary.record.tally()).toEqual({ success: 2, skipped: 0, error: 2 });
      expect(summary.record.steps[4].outcome).toEqual({
        status: 'error',
        kind: 'ElementNotFound',
        message: 'element not found: Export',
      });
      expect(summary.record.steps[4].evidence).toEqual({ error: { viewport: `${TASK_ID}/step_4_error.png` } });
      expect(page.actions).toEqual(['click:Save', 'click:Cancel']);
      expect(repository.saves).toBe(1);
    });

    it('should pause after an error that does not trip the breaker', async () => {
      const page = buttons();
      const { executor, record, clock } = setup(page, { errorPauseMs: 1234 });

      await executor.execute(record, [step('click', 'Archive'), step('wait', null, '0')]);

      expect(clock.sleeps).toContain(1234);
    });

    it('should honour a configured threshold', async () => {
      const page = buttons();
      const { executor, record } = setup(page, { maxConsecutiveErrors: 3 });

      const summary = await executor.execute(record, [
        step('click', 'Archive'),
        step('click', 'Export'),
        step('click', 'Save'),
      ]);

      expect(summary.state).toBe(CaptureState.COMPLETED);
      expect(summary.record.stepCount).toBe(4);
    });

    it('should never halt on skipped steps', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [
        step('fill', 'Email address', 'a@b.test'),
        step('fill', 'Email address', 'a@b.test'),
        step('fill', 'Email address', 'a@b.test'),
        step('fill', 'Email address', 'a@b.test'),
      ]);

      expect(summary.state).toBe(CaptureState.COMPLETED);
      expect(summary.record.stepCount).toBe(5);
      expect(summary.record.steps[4].outcome).toEqual({ status: 'skipped', reason: 'element not fillable' });
    });

    it('should reset the error streak on a skipped step', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [
        step('click', 'Archive'),
        step('fill', 'Email address'),
        step('click', 'Export'),
        step('click', 'Save'),
      ]);

      expect(summary.state).toBe(CaptureState.COMPLETED);
      expect(summary.record.tally()).toEqual({ success: 1, skipped: 1, error: 2 });
    });
  });

  describe('step handling', () => {
    it('should report no state change when the page is left as it was', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('click', 'Save')]);

      expect(summary.record.steps[1].outcome).toEqual({ status: 'success' });
      expect(summary.record.steps[1].stateChanged).toBe(false);
    });

    it('should never act on a blank target', async () => {
      const page = new FakePage([
        { tag: 'button', text: 'Delete account' },
        { tag: 'button', text: 'Save' },
      ]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [
        step('click', '', null, ' '),
        step('fill', '   ', 'hello', ' '),
      ]);

      expect(page.actions).toEqual([]);
      expect(summary.state).toBe(CaptureState.COMPLETED);
      expect(summary.record.steps[1].outcome).toEqual({
        status: 'error',
        kind: 'ElementNotFound',
        message: 'element not found: (empty target)',
      });
      expect(summary.record.steps[2].outcome).toEqual({ status: 'skipped', reason: 'element not fillable' });
    });

    it('should drop unknown action types without numbering them', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('scroll', 'down'), step('click', 'Save')]);

      expect(summary.record.stepCount).toBe(2);
      expect(summary.record.steps[1].actionType).toBe('click');
      expect(summary.record.steps[1].stepNumber).toBe(1);
    });

    it.each<[string | null, number]>([
      [null, 1000],
      ['2.5', 2500],
      ['soon', 1000],
      ['-2', 1000],
    ])('should wait for value %p as %p ms', async (value, expectedMs) => {
      const page = buttons();
      const { executor, record } = setup(page);

      await executor.execute(record, [step('wait', null, value)]);

      expect(page.waits).toEqual([expectedMs]);
    });

    it('should retry a refused click with force', async () => {
      const page = new FakePage([{ tag: 'button', text: 'Publish', clickable: 'force-only' }]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('click', 'Publish')]);

      expect(page.actions).toEqual(['click:Publish', 'click(force):Publish']);
      expect(summary.record.steps[1].outcome).toEqual({ status: 'success' });
    });

    it('should record an action error when even a forced click fails', async () => {
      const page = new FakePage([{ tag: 'button', text: 'Publish', clickable: 'never' }]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('click', 'Publish')]);
      const result = summary.record.steps[1];

      expect(result.outcome).toEqual({
        status: 'error',
        kind: 'ActionExecutionFailed',
        message: 'action failed: click on Publish (element intercepts pointer events)',
      });
      expect(result.evidence).toEqual({
        before: { viewport: `${TASK_ID}/step_1_Abefore.png` },
        error: { viewport: `${TASK_ID}/step_1_error.png` },
      });
    });

    it('should type into editable regions that refuse fill', async () => {
      const notes = { tag: 'div', text: 'Notes', attrs: { contenteditable: 'true' }, value: '' };
      const page = new FakePage([notes]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('fill', 'Notes', 'weekly sync')]);

      expect(summary.record.steps[1].outcome).toEqual({ status: 'success' });
      expect(notes.value).toBe('weekly sync');
      expect(page.actions).toEqual([
        'fill:weekly sync',
        'click:Notes',
        'press:Control+a',
        'press:Backspace',
        'type:weekly sync',
      ]);
    });

    it('should skip custom elements that accept no text', async () => {
      const page = new FakePage([{ tag: 'div', text: 'Status', typeable: false }]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('fill', 'Status')]);
      const result = summary.record.steps[1];

      expect(result.outcome).toEqual({ status: 'skipped', reason: 'custom ui element' });
      expect(result.evidence).toEqual({ before: { viewport: `${TASK_ID}/step_1_Abefore.png` } });
      expect(page.actions).toContain('type:sample text');
    });

    it('should navigate and capture the new page', async () => {
      const page = buttons();
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('navigate', null, 'https://app.test/projects')]);
      const result = summary.record.steps[1];

      expect(result.outcome).toEqual({ status: 'success' });
      expect(result.url).toBe('https://app.test/projects');
      expect(result.evidence).toEqual({ state: { viewport: `${TASK_ID}/step_1_navigate.png` } });
    });

    it('should record navigation failures as step errors', async () => {
      const page = buttons();
      page.unreachableUrls.add('https://bad.test');
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('navigate', 'https://bad.test'), step('navigate', null)]);

      expect(summary.record.steps[1].outcome).toEqual({
        status: 'error',
        kind: 'NavigationFailed',
        message: 'failed to navigate to https://bad.test: net::ERR_NAME_NOT_RESOLVED at https://bad.test',
      });
      expect(summary.record.steps[2].outcome).toEqual({
        status: 'error',
        kind: 'NavigationFailed',
        message: 'failed to navigate to (none): no URL given',
      });
      expect(summary.state).toBe(CaptureState.HALTED_BY_CIRCUIT_BREAKER);
    });

    it('should keep going when evidence cannot be captured', async () => {
      const page = buttons();
      page.failEvidence = true;
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('click', 'Save')]);

      expect(summary.record.steps[0].evidence).toEqual({ state: {} });
      expect(summary.record.steps[1].outcome).toEqual({ status: 'success' });
      expect(summary.record.steps[1].evidence).toEqual({ before: {}, after: {} });
    });

    it('should look in the open menu when the description mentions one', async () => {
      const page = new FakePage([
        { tag: 'button', text: 'Task' },
        { tag: 'div', role: 'menu' },
        { tag: 'div', role: 'menuitem', text: 'Task' },
      ]);
      const { executor, record } = setup(page);

      const summary = await executor.execute(record, [step('click', 'Task', null, 'choose Task from the menu')]);

      expect(summary.record.steps[1].strategy).toBe('menu');
      expect(summary.record.steps[1].evidence.before).toEqual({ viewport: `${TASK_ID}/step_1_Abefore.png` });
    });
  });
});

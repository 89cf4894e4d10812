import { Entity } from '../shared/Entity';
import { DomainError } from '../errors/AppErrors';
import { StepResult } from './StepResult';
import { PersistedWorkflow, persistedWorkflowSchema } from './WorkflowRecordSchema';

/**
 * Metadata a capture starts with.
 */
export interface WorkflowRecordConfig {
  query: string;
  app: string;
  action: string;
  entity: string;
  startUrl: string;
}

export interface WorkflowRecordProps extends WorkflowRecordConfig {
  capturedAt: Date;
  steps: StepResult[];
}

/**
 * Ordered capture of one task. The entity id is the task id.
 */
export class WorkflowRecord extends Entity<WorkflowRecordProps> {
  private constructor(props: WorkflowRecordProps, taskId: string) {
    super(props, taskId);
  }

  static create(taskId: string, config: WorkflowRecordConfig, capturedAt: Date = new Date()): WorkflowRecord {
    return new WorkflowRecord({ ...config, capturedAt, steps: [] }, taskId);
  }

  /**
   * Rebuild a record from its persisted JSON. Throws a ZodError on shape mismatch.
   */
  static fromJSON(data: unknown): WorkflowRecord {
    const parsed = persistedWorkflowSchema.parse(data);
    const record = new WorkflowRecord(
      {
        query: parsed.query,
        app: parsed.app,
        action: parsed.action,
        entity: parsed.entity,
        startUrl: parsed.start_url,
        capturedAt: new Date(parsed.captured_at),
        steps: [],
      },
      parsed.task_id
    );

    for (const step of parsed.steps) {
      record.append(StepResult.fromJSON(step));
    }

    return record;
  }

  get taskId(): string {
    return this.id;
  }

  get query(): string {
    return this.props.query;
  }

  get app(): string {
    return this.props.app;
  }

  get action(): string {
    return this.props.action;
  }

  get entity(): string {
    return this.props.entity;
  }

  get startUrl(): string {
    return this.props.startUrl;
  }

  get capturedAt(): Date {
    return this.props.capturedAt;
  }

  get steps(): ReadonlyArray<StepResult> {
    return this.props.steps;
  }

  get stepCount(): number {
    return this.props.steps.length;
  }

  /**
   * Number the next appended step must carry. Step 0 is the initial state.
   */
  get nextStepNumber(): number {
    return this.props.steps.length;
  }

  /**
   * Append a step result. Step numbers must stay contiguous from 0.
   */
  append(result: StepResult): void {
    if (result.stepNumber !== this.nextStepNumber) {
      throw new DomainError(
        `Step ${result.stepNumber} out of order in ${this.id}: expected ${this.nextStepNumber}`
      );
    }
    this.props.steps.push(result);
  }

  /**
   * Counts by outcome, excluding the initial state.
   */
  tally(): { success: number; skipped: number; error: number } {
    const counts = { success: 0, skipped: 0, error: 0 };
    for (const step of this.props.steps) {
      if (step.stepNumber === 0) continue;
      if (step.isSuccess()) counts.success++;
      else if (step.isSkipped()) counts.skipped++;
      else counts.error++;
    }
    return counts;
  }

  toJSON(): PersistedWorkflow {
    return {
      task_id: this.id,
      query: this.props.query,
      app: this.props.app,
      action: this.props.action,
      entity: this.props.entity,
      captured_at: this.props.capturedAt.toISOString(),
      start_url: this.props.startUrl,
      steps: this.props.steps.map(step => step.toJSON()),
    };
  }
}

import { ValueObject } from '../shared/ValueObject';
import { PersistedStep } from './WorkflowRecordSchema';

/**
 * Named artifact paths produced by one evidence capture (e.g. `viewport`, `highlighted`).
 */
export type EvidenceBundle = Record<string, string>;

/**
 * Evidence attached to a step. `state` is used for snapshots that are neither
 * before nor after an action (initial page, navigation).
 */
export interface StepEvidence {
  state?: EvidenceBundle;
  before?: EvidenceBundle;
  after?: EvidenceBundle;
  error?: EvidenceBundle;
}

export type SkipReason = 'element not fillable' | 'custom ui element';

export type StepErrorKind = 'ElementNotFound' | 'ActionExecutionFailed' | 'NavigationFailed' | 'Unexpected';

export type StepOutcome =
  | { status: 'success' }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'error'; kind: StepErrorKind; message: string };

/**
 * Properties for a StepResult.
 */
export interface StepResultProps {
  stepNumber: number;
  /** Set for synthetic steps such as `initial_state` */
  name?: string;
  actionType: string | null;
  target: string | null;
  value: string | null;
  description: string;
  outcome: StepOutcome;
  evidence: StepEvidence;
  /** Page URL once the step finished, when known */
  url: string | null;
  timestamp: Date;
  /** Whether the UI signature changed while settling; null when not measured */
  stateChanged: boolean | null;
  /** Wait duration in seconds */
  duration?: number;
  /** Resolution strategy that located the target */
  strategy?: string;
}

/**
 * Outcome of executing one planned step. Never mutated after it is appended.
 */
export class StepResult extends ValueObject<StepResultProps> {
  private constructor(props: StepResultProps) {
    super(props);
  }

  static create(props: Omit<StepResultProps, 'timestamp'> & { timestamp?: Date }): StepResult {
    return new StepResult({
      ...props,
      timestamp: props.timestamp ?? new Date(),
    });
  }

  /**
   * Step 0: the page as it looked before any planned step ran.
   */
  static initialState(url: string, evidence: EvidenceBundle): StepResult {
    return StepResult.create({
      stepNumber: 0,
      name: 'initial_state',
      actionType: null,
      target: null,
      value: null,
      description: 'initial page view',
      outcome: { status: 'success' },
      evidence: { state: evidence },
      url,
      stateChanged: null,
    });
  }

  static fromJSON(data: PersistedStep): StepResult {
    const evidence: StepEvidence = {};
    if (data.screenshots) evidence.state = data.screenshots;
    if (data.screenshots_before) evidence.before = data.screenshots_before;
    if (data.screenshots_after) evidence.after = data.screenshots_after;
    if (data.screenshots_error) evidence.error = data.screenshots_error;

    return new StepResult({
      stepNumber: data.step_number,
      name: data.name,
      actionType: data.action_type,
      target: data.target,
      value: data.value,
      description: data.description,
      outcome: data.outcome,
      evidence,
      url: data.url,
      timestamp: new Date(data.timestamp),
      stateChanged: data.state_changed,
      duration: data.duration,
      strategy: data.strategy,
    });
  }

  get stepNumber(): number {
    return this.props.stepNumber;
  }

  get name(): string | undefined {
    return this.props.name;
  }

  get actionType(): string | null {
    return this.props.actionType;
  }

  get target(): string | null {
    return this.props.target;
  }

  get value(): string | null {
    return this.props.value;
  }

  get description(): string {
    return this.props.description;
  }

  get outcome(): StepOutcome {
    return this.props.outcome;
  }

  get evidence(): StepEvidence {
    return this.props.evidence;
  }

  get url(): string | null {
    return this.props.url;
  }

  get timestamp(): Date {
    return this.props.timestamp;
  }

  get stateChanged(): boolean | null {
    return this.props.stateChanged;
  }

  get duration(): number | undefined {
    return this.props.duration;
  }

  get strategy(): string | undefined {
    return this.props.strategy;
  }

  isSuccess(): boolean {
    return this.props.outcome.status === 'success';
  }

  isSkipped(): boolean {
    return this.props.outcome.status === 'skipped';
  }

  isError(): boolean {
    return this.props.outcome.status === 'error';
  }

  /**
   * One-line summary for logs.
   */
  summarize(): string {
    const label = this.props.name ?? this.props.actionType ?? 'step';
    const target = this.props.target ? ` "${this.props.target}"` : '';
    const outcome = this.props.outcome;

    switch (outcome.status) {
      case 'success':
        return `Step ${this.stepNumber} [ok]: ${label}${target}`;
      case 'skipped':
        return `Step ${this.stepNumber} [skipped]: ${label}${target} (${outcome.reason})`;
      case 'error':
        return `Step ${this.stepNumber} [error]: ${label}${target} - ${outcome.message}`;
    }
  }

  toJSON(): PersistedStep {
    const { evidence } = this.props;
    const json: PersistedStep = {
      step_number: this.props.stepNumber,
      action_type: this.props.actionType,
      target: this.props.target,
      value: this.props.value,
      description: this.props.description,
      outcome: this.props.outcome,
      url: this.props.url,
      timestamp: this.props.timestamp.toISOString(),
      state_changed: this.props.stateChanged,
    };

    if (this.props.name !== undefined) json.name = this.props.name;
    if (evidence.state) json.screenshots = evidence.state;
    if (evidence.before) json.screenshots_before = evidence.before;
    if (evidence.after) json.screenshots_after = evidence.after;
    if (evidence.error) json.screenshots_error = evidence.error;
    if (this.props.duration !== undefined) json.duration = this.props.duration;
    if (this.props.strategy !== undefined) json.strategy = this.props.strategy;

    return json;
  }
}

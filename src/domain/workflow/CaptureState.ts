/**
 * Lifecycle of one workflow capture run.
 */
export enum CaptureState {
  /** Record created, initial evidence not yet taken */
  INIT = 'INIT',

  /** Consuming planned steps */
  RUNNING = 'RUNNING',

  /** Every planned step was consumed */
  COMPLETED = 'COMPLETED',

  /** Stopped early after too many consecutive step errors */
  HALTED_BY_CIRCUIT_BREAKER = 'HALTED_BY_CIRCUIT_BREAKER',
}

export const TERMINAL_CAPTURE_STATES: ReadonlySet<CaptureState> = new Set([
  CaptureState.COMPLETED,
  CaptureState.HALTED_BY_CIRCUIT_BREAKER,
]);

export function isTerminalCaptureState(state: CaptureState): boolean {
  return TERMINAL_CAPTURE_STATES.has(state);
}

const VALID_TRANSITIONS: ReadonlyMap<CaptureState, readonly CaptureState[]> = new Map([
  [CaptureState.INIT, [CaptureState.RUNNING]],
  [CaptureState.RUNNING, [CaptureState.COMPLETED, CaptureState.HALTED_BY_CIRCUIT_BREAKER]],
  [CaptureState.COMPLETED, []],
  [CaptureState.HALTED_BY_CIRCUIT_BREAKER, []],
]);

export function isValidCaptureTransition(from: CaptureState, to: CaptureState): boolean {
  return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

import {
  CaptureState,
  isTerminalCaptureState,
  isValidCaptureTransition,
} from '../../../src/domain/workflow/CaptureState';

describe('CaptureState', () => {
  describe('isValidCaptureTransition', () => {
    it('should allow INIT -> RUNNING', () => {
      expect(isValidCaptureTransition(CaptureState.INIT, CaptureState.RUNNING)).toBe(true);
    });

    it('should allow RUNNING to either end state', () => {
      expect(isValidCaptureTransition(CaptureState.RUNNING, CaptureState.COMPLETED)).toBe(true);
      expect(isValidCaptureTransition(CaptureState.RUNNING, CaptureState.HALTED_BY_CIRCUIT_BREAKER)).toBe(true);
    });

    it('should not allow skipping RUNNING', () => {
      expect(isValidCaptureTransition(CaptureState.INIT, CaptureState.COMPLETED)).toBe(false);
    });

    it('should not leave an end state', () => {
      expect(isValidCaptureTransition(CaptureState.COMPLETED, CaptureState.RUNNING)).toBe(false);
      expect(isValidCaptureTransition(CaptureState.HALTED_BY_CIRCUIT_BREAKER, CaptureState.RUNNING)).toBe(false);
    });
  });

  describe('isTerminalCaptureState', () => {
    it('should identify end states', () => {
      expect(isTerminalCaptureState(CaptureState.COMPLETED)).toBe(true);
      expect(isTerminalCaptureState(CaptureState.HALTED_BY_CIRCUIT_BREAKER)).toBe(true);
      expect(isTerminalCaptureState(CaptureState.RUNNING)).toBe(false);
    });
  });
});

import { UiSignals } from '../../domain/browser/UiSignals';

/**
 * Reads the fixed UI signal vector from the live page.
 */
export interface SignalSource {
  readSignals(): Promise<UiSignals>;
}

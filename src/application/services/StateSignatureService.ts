import { createHash } from 'crypto';
import { SignalSource } from '../ports/SignalSource';
import { canonicalJson } from '../../domain/shared/canonicalJson';
import { errorMessage } from '../../domain/errors/AppErrors';
import { getLogger } from '../../infrastructure/logging';
import { Clock, Sleep, realClock, realSleep } from './timing';

export interface StateSignatureOptions {
  now?: Clock;
  sleep?: Sleep;
}

const logger = getLogger('Signature');

/**
 * Fingerprints the UI signal vector and detects when it changes.
 *
 * The baseline belongs to one capture run. It only moves when a change is
 * observed; "no change" polls never touch it.
 */
export class StateSignatureService {
  private baseline: string | null = null;
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(
    private readonly signals: SignalSource,
    options: StateSignatureOptions = {}
  ) {
    this.now = options.now ?? realClock;
    this.sleep = options.sleep ?? realSleep;
  }

  /**
   * SHA-256 (hex) of the canonical signal vector, or '' when the page cannot be read.
   */
  async signature(): Promise<string> {
    try {
      const vector = await this.signals.readSignals();
      return createHash('sha256').update(canonicalJson(vector)).digest('hex');
    } catch (error) {
      logger.warn('Could not read UI signals', { error: errorMessage(error) });
      return '';
    }
  }

  /**
   * True on the first call, then true only when the signature differs from the baseline.
   */
  async hasChanged(): Promise<boolean> {
    const current = await this.signature();

    if (this.baseline === null || current !== this.baseline) {
      this.baseline = current;
      return true;
    }

    return false;
  }

  /**
   * Polls until the signature differs from the one read on entry, or the elapsed
   * time exceeds the timeout.
   */
  async waitForChange(timeoutMs: number, pollIntervalMs: number): Promise<boolean> {
    const initial = await this.signature();
    const start = this.now();

    while (this.now() - start <= timeoutMs) {
      await this.sleep(pollIntervalMs);

      const current = await this.signature();
      if (current !== initial) {
        this.baseline = current;
        logger.debug('UI state changed', { afterMs: this.now() - start });
        return true;
      }
    }

    logger.debug('No UI state change', { timeoutMs });
    return false;
  }

  get currentBaseline(): string | null {
    return this.baseline;
  }
}

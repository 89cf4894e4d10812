import { StateSignatureService } from '../../../src/application/services/StateSignatureService';
import { SignalSource } from '../../../src/application/ports/SignalSource';
import { UiSignals } from '../../../src/domain/browser/UiSignals';
import { FakePage } from '../../support/FakePage';
import { fakeClock } from '../../support/clock';

const signals = (overrides: Partial<UiSignals> = {}): UiSignals => ({
  url: 'https://app.test/home',
  title: 'Home',
  modalCount: 0,
  overlayCount: 0,
  activeElement: { tag: 'body', type: null, id: null },
  visibleForms: 0,
  loadingCount: 0,
  menuCount: 0,
  bodyStructure: { childCount: 3, classes: 'app' },
  ...overrides,
});

const sourceOf = (...vectors: UiSignals[]): SignalSource & { readSignals: jest.Mock } => {
  const readSignals = jest.fn();
  for (const vector of vectors) {
    readSignals.mockResolvedValueOnce(vector);
  }
  readSignals.mockResolvedValue(vectors[vectors.length - 1]);
  return { readSignals };
};

describe('StateSignatureService', () => {
  describe('signature', () => {
    it('should produce a SHA-256 hex digest', async () => {
      const service = new StateSignatureService(sourceOf(signals()));

      expect(await service.signature()).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should not depend on key order in the signal vector', async () => {
      const vector = signals();
      const reordered: UiSignals = {
        bodyStructure: vector.bodyStructure,
        menuCount: vector.menuCount,
        loadingCount: vector.loadingCount,
        visibleForms: vector.visibleForms,
        activeElement: vector.activeElement,
        overlayCount: vector.overlayCount,
        modalCount: vector.modalCount,
        title: vector.title,
        url: vector.url,
      };

      const a = await new StateSignatureService(sourceOf(vector)).signature();
      const b = await new StateSignatureService(sourceOf(reordered)).signature();

      expect(a).toBe(b);
    });

    it('should change when any signal changes', async () => {
      const service = new StateSignatureService(sourceOf(signals(), signals({ menuCount: 1 })));

      expect(await service.signature()).not.toBe(await service.signature());
    });

    it('should return an empty signature when the page cannot be read', async () => {
      const service = new StateSignatureService({ readSignals: jest.fn().mockRejectedValue(new Error('detached')) });

      expect(await service.signature()).toBe('');
    });
  });

  describe('hasChanged', () => {
    it('should report a change on the first call', async () => {
      const service = new StateSignatureService(sourceOf(signals()));

      expect(await service.hasChanged()).toBe(true);
      expect(service.currentBaseline).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should report no change for an identical page and a change after it moves', async () => {
      const service = new StateSignatureService(sourceOf(signals(), signals(), signals({ modalCount: 1 })));

      await service.hasChanged();

      expect(await service.hasChanged()).toBe(false);
      expect(await service.hasChanged()).toBe(true);
    });
  });

  describe('waitForChange', () => {
    it('should return true as soon as the page differs from the entry state', async () => {
      const page = new FakePage([{ tag: 'button', text: 'Save' }]);
      page.loadingReads = 1;
      const clock = fakeClock();
      const service = new StateSignatureService(page, clock);

      const changed = await service.waitForChange(3000, 500);

      expect(changed).toBe(true);
      expect(page.signalReads).toBe(2);
      expect(clock.sleeps).toEqual([500]);
      expect(service.currentBaseline).toBe(await service.signature());
    });

    it('should poll until the elapsed time exceeds the timeout', async () => {
      const source = sourceOf(signals());
      const clock = fakeClock();
      const service = new StateSignatureService(source, clock);

      const changed = await service.waitForChange(1000, 500);

      expect(changed).toBe(false);
      // entry read plus polls at 500, 1000 and 1500 ms
      expect(source.readSignals).toHaveBeenCalledTimes(4);
      expect(clock.sleeps).toEqual([500, 500, 500]);
    });

    it('should leave the baseline alone on timeout', async () => {
      const clock = fakeClock();
      const service = new StateSignatureService(sourceOf(signals()), clock);
      await service.hasChanged();
      const baseline = service.currentBaseline;

      await service.waitForChange(500, 500);

      expect(service.currentBaseline).toBe(baseline);
    });
  });
});

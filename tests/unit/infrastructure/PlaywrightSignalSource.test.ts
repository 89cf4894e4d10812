import { PlaywrightSignalSource } from '../../../src/infrastructure/browser/PlaywrightSignalSource';
import { Page } from 'playwright';

describe('PlaywrightSignalSource', () => {
  it('should read the signal vector in the page', async () => {
    const vector = {
      url: 'https://app.test/home',
      title: 'Home',
      modalCount: 0,
      overlayCount: 0,
      activeElement: { tag: 'BODY', type: null, id: null },
      visibleForms: 1,
      loadingCount: 0,
      menuCount: 1,
      bodyStructure: { childCount: 4, classes: 'app' },
    };
    const mockPage = { evaluate: jest.fn().mockResolvedValue(vector) } as unknown as jest.Mocked<Page>;

    const signals = await new PlaywrightSignalSource(() => mockPage).readSignals();

    expect(signals).toEqual(vector);
    expect(mockPage.evaluate).toHaveBeenCalledWith(
      expect.any(Function),
      expect.objectContaining({ menu: '[role="menu"], [role="listbox"]' })
    );
  });
});

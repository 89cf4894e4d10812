import { Locator } from 'playwright';
import { ElementHandle } from '../../application/ports/PageQueryPort';

/**
 * ElementHandle backed by a Playwright locator.
 */
export class PlaywrightElementHandle implements ElementHandle {
  constructor(
    readonly locator: Locator,
    readonly label: string
  ) {}

  count(): Promise<number> {
    return this.locator.count();
  }

  isVisible(): Promise<boolean> {
    return this.locator.first().isVisible();
  }

  first(): PlaywrightElementHandle {
    return new PlaywrightElementHandle(this.locator.first(), `${this.label} >> nth=0`);
  }
}

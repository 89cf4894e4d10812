import { Page } from 'playwright';
import { SignalSource } from '../../application/ports/SignalSource';
import { UiSignals } from '../../domain/browser/UiSignals';

const SIGNAL_SELECTORS = {
  modal: '[role="dialog"], .modal, [class*="Modal"], [class*="modal"]',
  overlay: '[class*="overlay"], [class*="backdrop"], [class*="Overlay"]',
  loading: '[class*="loading"], [class*="spinner"], [class*="Loading"], [class*="Spinner"]',
  menu: '[role="menu"], [role="listbox"]',
};

/**
 * Reads the UI signal vector. Counts only include visible elements, so a
 * hidden-but-mounted modal does not look like an open one.
 */
export class PlaywrightSignalSource implements SignalSource {
  constructor(private readonly page: () => Page) {}

  readSignals(): Promise<UiSignals> {
    return this.page().evaluate(selectors => {
      const visibleCount = (selector: string): number =>
        Array.from(document.querySelectorAll(selector)).filter(el => {
          const rect = el.getBoundingClientRect();
          const style = window.getComputedStyle(el);
          return rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden';
        }).length;

      const active = document.activeElement;

      return {
        url: window.location.href,
        title: document.title,
        modalCount: visibleCount(selectors.modal),
        overlayCount: visibleCount(selectors.overlay),
        activeElement: active
          ? {
              tag: active.tagName,
              type: active.getAttribute('type'),
              id: active.id || null,
            }
          : null,
        visibleForms: visibleCount('form'),
        loadingCount: visibleCount(selectors.loading),
        menuCount: visibleCount(selectors.menu),
        bodyStructure: document.body
          ? { childCount: document.body.children.length, classes: document.body.className }
          : null,
      };
    }, SIGNAL_SELECTORS);
  }
}

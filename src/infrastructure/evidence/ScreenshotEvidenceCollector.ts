import * as fs from 'fs/promises';
import * as path from 'path';
import { Locator, Page } from 'playwright';
import { EvidencePort } from '../../application/ports/EvidencePort';
import { ElementHandle } from '../../application/ports/PageQueryPort';
import { EvidenceBundle } from '../../domain/workflow/StepResult';
import { errorMessage } from '../../domain/errors/AppErrors';
import { PlaywrightElementHandle } from '../browser/PlaywrightElementHandle';
import { getLogger } from '../logging';

export interface ScreenshotEvidenceOptions {
  /** Pause between drawing the highlight and taking the screenshot (default: 300) */
  highlightSettleMs?: number;
  now?: () => number;
}

const ERROR_ANNOTATION_LENGTH = 50;

const logger = getLogger('Evidence');

/**
 * Writes step screenshots into the task directory:
 * `<step>_<timestamp>_{highlighted,viewport,full}.png`.
 *
 * A highlighted capture is taken when a target element is given; a full-page
 * capture is added when the viewport is the only one that succeeded.
 */
export class ScreenshotEvidenceCollector implements EvidencePort {
  private readonly highlightSettleMs: number;
  private readonly now: () => number;

  constructor(
    private readonly page: () => Page,
    private readonly taskDir: (taskId: string) => string,
    options: ScreenshotEvidenceOptions = {}
  ) {
    this.highlightSettleMs = options.highlightSettleMs ?? 300;
    this.now = options.now ?? (() => Date.now());
  }

  async captureState(
    stepName: string,
    taskId: string,
    annotation?: string,
    highlight?: ElementHandle
  ): Promise<EvidenceBundle> {
    const dir = this.taskDir(taskId);
    await fs.mkdir(dir, { recursive: true });

    const page = this.page();
    const prefix = path.join(dir, `${stepName}_${this.now()}`);
    const bundle: EvidenceBundle = {};

    if (highlight instanceof PlaywrightElementHandle) {
      const highlightedPath = `${prefix}_highlighted.png`;
      try {
        await this.captureHighlighted(page, highlight.locator, highlightedPath, annotation ?? '');
        bundle.highlighted = highlightedPath;
      } catch (error) {
        logger.warn('Highlighted capture failed', { stepName, error: errorMessage(error) });
      }
    }

    const viewportPath = `${prefix}_viewport.png`;
    try {
      await page.screenshot({ path: viewportPath, fullPage: false });
      bundle.viewport = viewportPath;
    } catch (error) {
      logger.error('Viewport capture failed', { stepName, error: errorMessage(error) });
    }

    if (Object.keys(bundle).length === 1 && bundle.viewport) {
      const fullPath = `${prefix}_full.png`;
      try {
        await page.screenshot({ path: fullPath, fullPage: true });
        bundle.full_page = fullPath;
      } catch (error) {
        logger.warn('Full page capture failed', { stepName, error: errorMessage(error) });
      }
    }

    logger.debug('Captured evidence', { stepName, artifacts: Object.keys(bundle) });
    return bundle;
  }

  captureErrorState(stepName: string, taskId: string, message: string): Promise<EvidenceBundle> {
    return this.captureState(stepName, taskId, `error: ${message.substring(0, ERROR_ANNOTATION_LENGTH)}`);
  }

  private async captureHighlighted(page: Page, locator: Locator, filePath: string, label: string): Promise<void> {
    await locator.evaluate((el, text) => {
      if (!(el instanceof HTMLElement)) return;
      el.dataset.captureOutline = el.style.outline;
      el.dataset.captureOutlineOffset = el.style.outlineOffset;
      el.dataset.captureBoxShadow = el.style.boxShadow;
      el.style.outline = '3px solid #FF6B6B';
      el.style.outlineOffset = '2px';
      el.style.boxShadow = '0 0 10px rgba(255, 107, 107, 0.5)';

      if (text) {
        const rect = el.getBoundingClientRect();
        const badge = document.createElement('div');
        badge.id = '__capture_highlight_label';
        badge.textContent = text;
        badge.style.cssText =
          'position:absolute;background:#FF6B6B;color:white;padding:4px 8px;border-radius:4px;' +
          'font-size:12px;font-weight:bold;z-index:10000;pointer-events:none;';
        badge.style.left = `${rect.left}px`;
        badge.style.top = `${rect.top - 30}px`;
        document.body.appendChild(badge);
      }
    }, label);

    try {
      await locator.scrollIntoViewIfNeeded();
      await page.waitForTimeout(this.highlightSettleMs);
      await page.screenshot({ path: filePath });
    } finally {
      await locator.evaluate(el => {
        if (el instanceof HTMLElement) {
          el.style.outline = el.dataset.captureOutline ?? '';
          el.style.outlineOffset = el.dataset.captureOutlineOffset ?? '';
          el.style.boxShadow = el.dataset.captureBoxShadow ?? '';
          delete el.dataset.captureOutline;
          delete el.dataset.captureOutlineOffset;
          delete el.dataset.captureBoxShadow;
        }
        document.getElementById('__capture_highlight_label')?.remove();
      });
    }
  }
}

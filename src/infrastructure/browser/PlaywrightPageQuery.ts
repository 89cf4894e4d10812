import { Locator, Page } from 'playwright';
import { ElementHandle, PageQueryPort, ViewportSize } from '../../application/ports/PageQueryPort';
import { ElementDescriptor } from '../../domain/browser/ElementDescriptor';
import { MenuItemDescriptor } from '../../domain/browser/MenuItemDescriptor';
import { ControlSummary, PageContext } from '../../domain/browser/PageContext';
import { ElementQuery, TextMatch, describeQuery } from '../../domain/resolution/ElementQuery';
import { MENU_CONTAINER_SELECTORS, MENU_ITEM_SELECTORS } from '../../domain/resolution/MenuSelectors';
import { PlaywrightElementHandle } from './PlaywrightElementHandle';

const INTERACTIVE_SELECTOR = [
  'button',
  'a',
  'input',
  'textarea',
  'select',
  '[role="button"]',
  '[role="link"]',
  '[role="menuitem"]',
  '[role="option"]',
  '[contenteditable="true"]',
  '[onclick]',
].join(', ');

const MAX_TEXT_LENGTH = 100;
const MAX_CONTROLS_PER_KIND = 30;
const MAX_HEADINGS = 10;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Playwright text matcher: plain strings match case-insensitive substrings,
 * `exact: true` strings match the trimmed text case-sensitively.
 */
function textMatcher(match: TextMatch): { text: string | RegExp; exact: boolean } {
  switch (match.mode) {
    case 'exact':
      return { text: match.value, exact: true };
    case 'exact-ignore-case':
      return { text: new RegExp(`^\\s*${escapeRegExp(match.value.trim())}\\s*$`, 'i'), exact: false };
    case 'contains':
      return { text: match.value, exact: false };
  }
}

/**
 * Filter pattern for `locator.filter({ hasText })`, which only takes substrings or patterns.
 */
function hasTextPattern(match: TextMatch): string | RegExp {
  const value = escapeRegExp(match.value.trim());
  switch (match.mode) {
    case 'exact':
      return new RegExp(`^\\s*${value}\\s*$`);
    case 'exact-ignore-case':
      return new RegExp(`^\\s*${value}\\s*$`, 'i');
    case 'contains':
      return match.value;
  }
}

/**
 * PageQueryPort over a Playwright page. DOM reads run in the page through
 * `page.evaluate`, so each callback is self-contained.
 */
export class PlaywrightPageQuery implements PageQueryPort {
  constructor(private readonly page: () => Page) {}

  locate(query: ElementQuery): ElementHandle {
    return new PlaywrightElementHandle(this.toLocator(query), describeQuery(query));
  }

  private toLocator(query: ElementQuery): Locator {
    const page = this.page();

    switch (query.kind) {
      case 'text': {
        const { text, exact } = textMatcher(query.text);
        return page.getByText(text, { exact });
      }
      case 'attribute': {
        const operator = query.mode === 'contains' ? '*=' : '=';
        return page.locator(`[${query.attribute}${operator}"${escapeAttribute(query.value)}" i]`);
      }
      case 'role': {
        const { text, exact } = textMatcher(query.name);
        return page.getByRole(query.role, { name: text, exact });
      }
      case 'selector': {
        const locator = page.locator(query.selector);
        return query.hasText ? locator.filter({ hasText: hasTextPattern(query.hasText) }) : locator;
      }
      case 'id':
        return page.locator(`[id="${escapeAttribute(query.id)}"]`);
    }
  }

  async enumerateInteractiveElements(): Promise<ElementDescriptor[]> {
    const raw = await this.page().evaluate(
      ([selector, maxText]) => {
        const visible = (el: Element): boolean => {
          const rect = el.getBoundingClientRect();
          const style = window.getComputedStyle(el);
          return (
            rect.width > 0 &&
            rect.height > 0 &&
            style.display !== 'none' &&
            style.visibility !== 'hidden' &&
            style.opacity !== '0'
          );
        };

        return Array.from(document.querySelectorAll(selector)).map(el => {
          const rect = el.getBoundingClientRect();
          const text = el instanceof HTMLElement ? el.innerText : (el.textContent ?? '');
          return {
            tag: el.tagName.toLowerCase(),
            text: text.trim().substring(0, maxText),
            accessibleName: el.getAttribute('aria-label') ?? undefined,
            id: el.id || undefined,
            classes: Array.from(el.classList),
            placeholder: el.getAttribute('placeholder') ?? undefined,
            testId: el.getAttribute('data-testid') ?? undefined,
            inputType: el instanceof HTMLInputElement ? el.type : undefined,
            isVisible: visible(el),
            boundingBox: { x: rect.x, y: rect.y, width: rect.width, height: rect.height },
          };
        });
      },
      [INTERACTIVE_SELECTOR, MAX_TEXT_LENGTH] as const
    );

    return raw.map(props => ElementDescriptor.create(props));
  }

  async countVisibleMenuContainers(): Promise<number> {
    return this.page().evaluate(selectors => {
      const seen = new Set<Element>();
      for (const selector of selectors) {
        document.querySelectorAll(selector).forEach(el => {
          const rect = el.getBoundingClientRect();
          const style = window.getComputedStyle(el);
          if (rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden') {
            seen.add(el);
          }
        });
      }
      return seen.size;
    }, [...MENU_CONTAINER_SELECTORS]);
  }

  async enumerateMenuItems(): Promise<MenuItemDescriptor[]> {
    return this.page().evaluate(selectors => {
      const seen = new Set<Element>();
      const items: Array<{ text: string; accessibleName?: string; classes: string[]; id?: string; index: number }> = [];

      for (const selector of selectors) {
        let index = 0;
        document.querySelectorAll(selector).forEach(el => {
          const rect = el.getBoundingClientRect();
          const style = window.getComputedStyle(el);
          const isVisible =
            rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden';
          if (!isVisible || seen.has(el)) return;
          seen.add(el);

          const text = (el.textContent ?? '').trim();
          if (!text) return;

          items.push({
            text,
            accessibleName: el.getAttribute('aria-label') ?? undefined,
            classes: Array.from(el.classList),
            id: el.id || undefined,
            index: index++,
          });
        });
      }

      return items;
    }, [...MENU_ITEM_SELECTORS]);
  }

  async getViewportSize(): Promise<ViewportSize> {
    const page = this.page();
    return page.viewportSize() ?? page.evaluate(() => ({ width: window.innerWidth, height: window.innerHeight }));
  }

  async readPageContext(): Promise<PageContext> {
    const page = this.page();
    const [title, snapshot] = await Promise.all([
      page.title(),
      page.evaluate(
        ([maxPerKind, maxHeadings]) => {
          const visible = (el: Element): boolean => {
            const rect = el.getBoundingClientRect();
            const style = window.getComputedStyle(el);
            return rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden';
          };
          const textOf = (el: Element): string => (el.textContent ?? '').trim().substring(0, 80);
          const pick = (selector: string): Element[] =>
            Array.from(document.querySelectorAll(selector)).filter(visible).slice(0, maxPerKind);

          const summary = (el: Element) => ({
            text: textOf(el) || undefined,
            accessibleName: el.getAttribute('aria-label') ?? undefined,
            id: el.id || undefined,
          });

          const modals = Array.from(document.querySelectorAll('[role="dialog"]')).filter(visible);
          const menus = Array.from(document.querySelectorAll('[role="menu"], [role="listbox"]')).filter(visible);

          return {
            buttons: pick('button, [role="button"]').map(summary),
            links: pick('a[href]').map(el => ({ ...summary(el), href: el.getAttribute('href') ?? undefined })),
            inputs: pick('input, textarea, [contenteditable="true"]').map(el => ({
              ...summary(el),
              inputType: el instanceof HTMLInputElement ? el.type : el.tagName.toLowerCase() === 'textarea' ? 'textarea' : 'contenteditable',
              placeholder: el.getAttribute('placeholder') ?? undefined,
            })),
            selects: pick('select, [role="combobox"], [role="listbox"]').map(summary),
            menuItems: pick('[role="menuitem"], [role="option"]').map(summary),
            headings: pick('h1, h2, h3')
              .map(textOf)
              .filter(text => text.length > 0)
              .slice(0, maxHeadings),
            modalCount: modals.length,
            menuCount: menus.length,
          };
        },
        [MAX_CONTROLS_PER_KIND, MAX_HEADINGS] as const
      ),
    ]);

    const kinded = (kind: ControlSummary['kind'], controls: Array<Omit<ControlSummary, 'kind'>>): ControlSummary[] =>
      controls.map(control => ({ kind, ...control }));

    return {
      url: page.url(),
      title,
      buttons: kinded('button', snapshot.buttons),
      links: kinded('link', snapshot.links),
      inputs: kinded('input', snapshot.inputs),
      selects: kinded('select', snapshot.selects),
      menuItems: kinded('menuitem', snapshot.menuItems),
      headings: snapshot.headings,
      uiState: {
        hasModal: snapshot.modalCount > 0,
        hasMenu: snapshot.menuCount > 0,
        modalCount: snapshot.modalCount,
        menuCount: snapshot.menuCount,
      },
    };
  }
}

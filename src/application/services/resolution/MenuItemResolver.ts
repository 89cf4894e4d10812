import { ElementHandle, PageQueryPort } from '../../ports/PageQueryPort';
import { MENU_ITEM_SELECTORS } from '../../../domain/resolution/MenuSelectors';
import { MENU_ACCEPT_THRESHOLD, pickBest, scoreMenuItem } from '../../../domain/resolution/MatchScoring';
import { getLogger } from '../../../infrastructure/logging';
import { Sleep, realSleep } from '../timing';
import { firstVisible } from './validity';

export interface MenuItemResolverOptions {
  /** Pause before looking for menu containers, letting a just-opened menu render */
  menuRenderDelayMs?: number;
  sleep?: Sleep;
}

const logger = getLogger('Resolver').child('Menu');

/**
 * Finds an item inside a currently open menu, listbox or dropdown.
 * Fails fast when no menu container is visible.
 */
export class MenuItemResolver {
  private readonly menuRenderDelayMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly pageQuery: PageQueryPort,
    options: MenuItemResolverOptions = {}
  ) {
    this.menuRenderDelayMs = options.menuRenderDelayMs ?? 300;
    this.sleep = options.sleep ?? realSleep;
  }

  async resolve(description: string, keywords: readonly string[]): Promise<ElementHandle | null> {
    await this.sleep(this.menuRenderDelayMs);

    const containers = await this.pageQuery.countVisibleMenuContainers();
    if (containers === 0) {
      logger.debug('No visible menu container', { description });
      return null;
    }

    const exact = await this.findByExactText([description, ...keywords]);
    if (exact) {
      return exact;
    }

    const items = await this.pageQuery.enumerateMenuItems();
    const best = pickBest(items, item => scoreMenuItem(item, description, keywords));

    if (!best || best.score <= MENU_ACCEPT_THRESHOLD) {
      logger.debug('No menu item scored high enough', {
        description,
        items: items.length,
        bestScore: best?.score ?? 0,
      });
      return null;
    }

    logger.debug('Scored menu item', { text: best.candidate.text, score: best.score });

    if (best.candidate.id) {
      const byId = await firstVisible(this.pageQuery.locate({ kind: 'id', id: best.candidate.id }));
      if (byId) {
        return byId;
      }
    }

    return this.findByExactText([best.candidate.text.trim()]);
  }

  private async findByExactText(terms: readonly string[]): Promise<ElementHandle | null> {
    for (const selector of MENU_ITEM_SELECTORS) {
      for (const term of terms) {
        const handle = await firstVisible(
          this.pageQuery.locate({
            kind: 'selector',
            selector,
            hasText: { value: term, mode: 'exact-ignore-case' },
          })
        );
        if (handle) {
          return handle;
        }
      }
    }
    return null;
  }
}

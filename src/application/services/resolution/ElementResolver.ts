import { ElementHandle, PageQueryPort } from '../../ports/PageQueryPort';
import { ElementDescriptor } from '../../../domain/browser/ElementDescriptor';
import {
  CATEGORY_ROLES,
  CATEGORY_SELECTORS,
  EDGE_FRACTION,
  ElementCategory,
  ViewportEdge,
} from '../../../domain/resolution/ElementCategory';
import { queryForDescriptor } from '../../../domain/resolution/ElementQuery';
import {
  detectPositionHint,
  extractKeywords,
  inferCategory,
  looksLikeMenuItem,
} from '../../../domain/resolution/KeywordExtractor';
import {
  FUZZY_ACCEPT_THRESHOLD,
  MULTI_MATCH_THRESHOLD,
  pickBest,
  scoreElement,
} from '../../../domain/resolution/MatchScoring';
import { errorMessage } from '../../../domain/errors/AppErrors';
import { getLogger } from '../../../infrastructure/logging';
import { MenuItemResolver, MenuItemResolverOptions } from './MenuItemResolver';
import { firstVisible } from './validity';

/**
 * One step of the resolution cascade. Returns null when it has no match.
 */
export type ResolutionStrategy = (
  description: string,
  keywords: readonly string[],
  category: ElementCategory
) => Promise<ElementHandle | null>;

export type StrategyName =
  | 'menu'
  | 'exact_text'
  | 'accessibility'
  | 'semantic_text'
  | 'structural'
  | 'visual'
  | 'fuzzy';

export type ResolutionResult =
  | { found: true; handle: ElementHandle; strategy: StrategyName }
  | { found: false };

const STRUCTURAL_ATTRIBUTES = ['id', 'name', 'placeholder', 'data-testid', 'class', 'title'] as const;

const logger = getLogger('Resolver');

/**
 * Maps a natural-language description to a single visible element.
 *
 * Strategies run in a fixed order and the first validated match wins:
 * exact text, accessible name, category-scoped text, structural attributes,
 * viewport position, and finally a fuzzy score over all interactive elements.
 * Descriptions that read like menu items (or calls made in menu context) try
 * the open menu first.
 */
export class ElementResolver {
  private readonly menuResolver: MenuItemResolver;
  private readonly strategies: ReadonlyArray<readonly [StrategyName, ResolutionStrategy]>;

  constructor(
    private readonly pageQuery: PageQueryPort,
    options: MenuItemResolverOptions = {}
  ) {
    this.menuResolver = new MenuItemResolver(pageQuery, options);
    this.strategies = [
      ['exact_text', (d) => this.byExactText(d)],
      ['accessibility', (d, k, c) => this.byAccessibleName(d, k, c)],
      ['semantic_text', (d, k, c) => this.bySemanticText(d, k, c)],
      ['structural', (_d, k) => this.byStructuralAttribute(k)],
      ['visual', (d, k) => this.byPosition(d, k)],
      ['fuzzy', (d, k, c) => this.byFuzzyScore(d, k, c)],
    ];
  }

  async resolve(
    description: string,
    typeHint?: ElementCategory,
    inMenuContext = false
  ): Promise<ResolutionResult> {
    if (!description.trim()) {
      return { found: false };
    }
    const keywords = extractKeywords(description);

    if (inMenuContext || looksLikeMenuItem(description)) {
      const handle = await this.attempt('menu', () => this.menuResolver.resolve(description, keywords));
      if (handle) {
        return this.found(description, handle, 'menu');
      }
    }

    const category = typeHint ?? inferCategory(description);

    for (const [name, strategy] of this.strategies) {
      const handle = await this.attempt(name, () => strategy(description, keywords, category));
      if (handle) {
        return this.found(description, handle, name);
      }
    }

    logger.info('Element not found', { description, category, keywords });
    return { found: false };
  }

  /**
   * Up to `maxResults` visible elements scoring above the multi-match
   * threshold, best first.
   */
  async findAll(description: string, maxResults = 5): Promise<ElementHandle[]> {
    const keywords = extractKeywords(description);
    const category = inferCategory(description);

    let elements: ElementDescriptor[];
    try {
      elements = await this.pageQuery.enumerateInteractiveElements();
    } catch (error) {
      logger.warn('Could not enumerate elements', { error: errorMessage(error) });
      return [];
    }

    const ranked = elements
      .filter(element => element.isVisible)
      .map(element => ({ element, score: scoreElement(element, description, keywords, category) }))
      .filter(entry => entry.score > MULTI_MATCH_THRESHOLD)
      .sort((a, b) => b.score - a.score);

    const handles: ElementHandle[] = [];
    for (const { element } of ranked) {
      if (handles.length >= maxResults) break;
      const handle = await firstVisible(this.pageQuery.locate(queryForDescriptor(element)));
      if (handle) {
        handles.push(handle);
      }
    }
    return handles;
  }

  private async attempt(
    name: StrategyName,
    run: () => Promise<ElementHandle | null>
  ): Promise<ElementHandle | null> {
    try {
      return await run();
    } catch (error) {
      logger.debug('Strategy failed', { strategy: name, error: errorMessage(error) });
      return null;
    }
  }

  private found(description: string, handle: ElementHandle, strategy: StrategyName): ResolutionResult {
    logger.debug('Resolved element', { description, strategy, handle: handle.label });
    return { found: true, handle, strategy };
  }

  private async firstMatch(handles: Iterable<ElementHandle>): Promise<ElementHandle | null> {
    for (const handle of handles) {
      const valid = await firstVisible(handle);
      if (valid) {
        return valid;
      }
    }
    return null;
  }

  private byExactText(description: string): Promise<ElementHandle | null> {
    const q = this.pageQuery;
    return this.firstMatch([
      q.locate({ kind: 'text', text: { value: description, mode: 'exact' } }),
      q.locate({ kind: 'text', text: { value: description, mode: 'exact-ignore-case' } }),
    ]);
  }

  private byAccessibleName(
    description: string,
    keywords: readonly string[],
    category: ElementCategory
  ): Promise<ElementHandle | null> {
    const q = this.pageQuery;

    function* candidates(): Generator<ElementHandle> {
      yield q.locate({ kind: 'attribute', attribute: 'aria-label', value: description, mode: 'equals' });
      for (const keyword of keywords) {
        yield q.locate({ kind: 'attribute', attribute: 'aria-label', value: keyword, mode: 'contains' });
      }
      for (const role of CATEGORY_ROLES[category]) {
        for (const term of [description, ...keywords]) {
          yield q.locate({ kind: 'role', role, name: { value: term, mode: 'contains' } });
        }
      }
    }

    return this.firstMatch(candidates());
  }

  private bySemanticText(
    description: string,
    keywords: readonly string[],
    category: ElementCategory
  ): Promise<ElementHandle | null> {
    const q = this.pageQuery;
    const selectors = CATEGORY_SELECTORS[category];

    function* candidates(): Generator<ElementHandle> {
      for (const selector of selectors) {
        yield q.locate({ kind: 'selector', selector, hasText: { value: description, mode: 'contains' } });
      }
      for (const keyword of keywords) {
        for (const selector of selectors) {
          yield q.locate({ kind: 'selector', selector, hasText: { value: keyword, mode: 'contains' } });
        }
      }
      yield q.locate({ kind: 'text', text: { value: description, mode: 'contains' } });
    }

    return this.firstMatch(candidates());
  }

  private byStructuralAttribute(keywords: readonly string[]): Promise<ElementHandle | null> {
    const q = this.pageQuery;

    function* candidates(): Generator<ElementHandle> {
      for (const attribute of STRUCTURAL_ATTRIBUTES) {
        for (const keyword of keywords) {
          yield q.locate({ kind: 'attribute', attribute, value: keyword, mode: 'contains' });
        }
      }
    }

    return this.firstMatch(candidates());
  }

  private async byPosition(description: string, keywords: readonly string[]): Promise<ElementHandle | null> {
    const edge = detectPositionHint(description);
    if (!edge) {
      return null;
    }

    const [elements, viewport] = await Promise.all([
      this.pageQuery.enumerateInteractiveElements(),
      this.pageQuery.getViewportSize(),
    ]);

    const candidates = elements.filter(element => {
      if (!element.isVisible || !isAtEdge(element, edge, viewport.width, viewport.height)) {
        return false;
      }
      const text = element.text.toLowerCase();
      const name = (element.accessibleName ?? '').toLowerCase();
      return keywords.some(keyword => text.includes(keyword) || name.includes(keyword));
    });

    return this.firstMatch(candidates.map(element => this.pageQuery.locate(queryForDescriptor(element))));
  }

  private async byFuzzyScore(
    description: string,
    keywords: readonly string[],
    category: ElementCategory
  ): Promise<ElementHandle | null> {
    const elements = (await this.pageQuery.enumerateInteractiveElements()).filter(e => e.isVisible);
    const best = pickBest(elements, element => scoreElement(element, description, keywords, category));

    if (!best || best.score <= FUZZY_ACCEPT_THRESHOLD) {
      return null;
    }

    logger.debug('Fuzzy candidate', { element: best.candidate.describe(), score: best.score });
    return firstVisible(this.pageQuery.locate(queryForDescriptor(best.candidate)));
  }
}

function isAtEdge(element: ElementDescriptor, edge: ViewportEdge, width: number, height: number): boolean {
  const { x, y } = element.boundingBox;

  switch (edge) {
    case 'top':
      return y < height * EDGE_FRACTION;
    case 'bottom':
      return y > height * (1 - EDGE_FRACTION);
    case 'left':
      return x < width * EDGE_FRACTION;
    case 'right':
      return x > width * (1 - EDGE_FRACTION);
  }
}

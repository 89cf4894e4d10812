import { ActionResult, BrowserPort, ClickOptions } from '../../src/application/ports/BrowserPort';
import { ElementHandle, PageQueryPort, ViewportSize } from '../../src/application/ports/PageQueryPort';
import { EvidencePort } from '../../src/application/ports/EvidencePort';
import { SignalSource } from '../../src/application/ports/SignalSource';
import { BoundingRect, ElementDescriptor } from '../../src/domain/browser/ElementDescriptor';
import { MenuItemDescriptor } from '../../src/domain/browser/MenuItemDescriptor';
import { ControlSummary, PageContext } from '../../src/domain/browser/PageContext';
import { UiSignals } from '../../src/domain/browser/UiSignals';
import { ElementQuery, TextMatch, describeQuery } from '../../src/domain/resolution/ElementQuery';
import { MENU_CONTAINER_SELECTORS, MENU_ITEM_SELECTORS } from '../../src/domain/resolution/MenuSelectors';
import { EvidenceBundle } from '../../src/domain/workflow/StepResult';

/**
 * One node of the fake DOM. Only the attributes the engine reads are modelled.
 */
export interface FakeNode {
  tag: string;
  text?: string;
  /** aria-label */
  name?: string;
  id?: string;
  classes?: string[];
  role?: string;
  attrs?: Record<string, string>;
  visible?: boolean;
  rect?: BoundingRect;
  /** Whether `fill` works on it (default: input and textarea) */
  fillable?: boolean;
  /** Whether keyboard typing works after focusing it (default: true) */
  typeable?: boolean;
  /** 'force-only' nodes reject normal clicks (default: 'always') */
  clickable?: 'always' | 'force-only' | 'never';
  onClick?: (page: FakePage) => void;
  value?: string;
}

const IMPLICIT_ROLES: Record<string, string> = {
  button: 'button',
  a: 'link',
  input: 'textbox',
  textarea: 'textbox',
  select: 'combobox',
};

const INTERACTIVE_TAGS = new Set(['button', 'a', 'input', 'textarea', 'select']);
const INTERACTIVE_ROLES = new Set(['button', 'link', 'menuitem', 'option', 'tab']);

const SIMPLE_SELECTOR = /^([a-z]+)?(?:\.([\w-]+))?(?:\[([\w-]+)(\*?=)"([^"]*)"\])?$/;

function attributeOf(node: FakeNode, attribute: string): string | undefined {
  switch (attribute) {
    case 'id':
      return node.id;
    case 'class':
      return node.classes?.join(' ');
    case 'role':
      return node.role;
    case 'aria-label':
      return node.name;
    default:
      return node.attrs?.[attribute];
  }
}

/**
 * Matches the selector subset the engine uses: `tag`, `tag.class`,
 * `[attr="v"]`, `[attr*="v"]`, optionally prefixed by a tag.
 * Descendant selectors never match.
 */
export function matchesSelector(node: FakeNode, selector: string): boolean {
  const match = SIMPLE_SELECTOR.exec(selector.trim());
  if (!match) {
    return false;
  }
  const [, tag, cls, attribute, operator, value] = match;

  if (tag && node.tag !== tag) return false;
  if (cls && !(node.classes ?? []).includes(cls)) return false;
  if (attribute) {
    const actual = attributeOf(node, attribute);
    if (actual === undefined) return false;
    return operator === '*=' ? actual.includes(value) : actual === value;
  }
  return Boolean(tag || cls);
}

function matchesText(actual: string | undefined, match: TextMatch): boolean {
  if (actual === undefined) return false;
  const text = actual.trim();
  switch (match.mode) {
    case 'exact':
      return text === match.value;
    case 'exact-ignore-case':
      return text.toLowerCase() === match.value.trim().toLowerCase();
    case 'contains':
      return text.toLowerCase().includes(match.value.toLowerCase());
  }
}

function matchesQuery(node: FakeNode, query: ElementQuery): boolean {
  switch (query.kind) {
    case 'text':
      return matchesText(node.text, query.text);
    case 'attribute': {
      const actual = attributeOf(node, query.attribute)?.toLowerCase();
      const expected = query.value.toLowerCase();
      if (actual === undefined) return false;
      return query.mode === 'contains' ? actual.includes(expected) : actual === expected;
    }
    case 'role': {
      const role = node.role ?? IMPLICIT_ROLES[node.tag];
      return role === query.role && matchesText(node.name ?? node.text, query.name);
    }
    case 'selector':
      return matchesSelector(node, query.selector) && (!query.hasText || matchesText(node.text, query.hasText));
    case 'id':
      return node.id === query.id;
  }
}

export class FakeHandle implements ElementHandle {
  constructor(
    private readonly page: FakePage,
    readonly label: string,
    private readonly query: ElementQuery,
    private readonly firstOnly = false
  ) {}

  nodes(): FakeNode[] {
    const all = this.page.nodes.filter(node => matchesQuery(node, this.query));
    return this.firstOnly ? all.slice(0, 1) : all;
  }

  async count(): Promise<number> {
    return this.nodes().length;
  }

  async isVisible(): Promise<boolean> {
    const [first] = this.nodes();
    return first !== undefined && first.visible !== false;
  }

  first(): FakeHandle {
    return new FakeHandle(this.page, `${this.label} >> nth=0`, this.query, true);
  }
}

function ok(): ActionResult {
  return { success: true, duration: 0 };
}

function failed(error: string): ActionResult {
  return { success: false, error, duration: 0 };
}

/**
 * In-process stand-in for a live page. Implements every port the engine talks
 * to and records what was done to it.
 */
export class FakePage implements PageQueryPort, SignalSource, BrowserPort, EvidencePort {
  nodes: FakeNode[];
  url: string;
  title = 'Fake app';
  /** Signal reads that still report a visible loading indicator */
  loadingReads = 0;
  unreachableUrls = new Set<string>();
  failEvidence = false;

  readonly actions: string[] = [];
  readonly captures: string[] = [];
  readonly waits: number[] = [];
  signalReads = 0;
  private focused: FakeNode | undefined;

  constructor(nodes: FakeNode[] = [], url = 'https://app.test/home') {
    this.nodes = nodes;
    this.url = url;
  }

  add(...nodes: FakeNode[]): void {
    this.nodes.push(...nodes);
  }

  private visibleNodes(): FakeNode[] {
    return this.nodes.filter(node => node.visible !== false);
  }

  private nodeOf(handle: ElementHandle): FakeNode | undefined {
    return handle instanceof FakeHandle ? handle.nodes()[0] : undefined;
  }

  // PageQueryPort

  locate(query: ElementQuery): ElementHandle {
    return new FakeHandle(this, describeQuery(query), query);
  }

  async enumerateInteractiveElements(): Promise<ElementDescriptor[]> {
    return this.nodes
      .filter(node => INTERACTIVE_TAGS.has(node.tag) || INTERACTIVE_ROLES.has(node.role ?? ''))
      .map(node =>
        ElementDescriptor.create({
          tag: node.tag,
          text: node.text ?? '',
          accessibleName: node.name,
          id: node.id,
          classes: node.classes ?? [],
          placeholder: node.attrs?.placeholder,
          testId: node.attrs?.['data-testid'],
          inputType: node.attrs?.type,
          isVisible: node.visible !== false,
          boundingBox: node.rect ?? { x: 500, y: 300, width: 80, height: 30 },
        })
      );
  }

  async countVisibleMenuContainers(): Promise<number> {
    return this.visibleNodes().filter(node => MENU_CONTAINER_SELECTORS.some(s => matchesSelector(node, s))).length;
  }

  async enumerateMenuItems(): Promise<MenuItemDescriptor[]> {
    const seen = new Set<FakeNode>();
    const items: MenuItemDescriptor[] = [];
    for (const selector of MENU_ITEM_SELECTORS) {
      let index = 0;
      for (const node of this.visibleNodes()) {
        if (seen.has(node) || !matchesSelector(node, selector) || !node.text) continue;
        seen.add(node);
        items.push({ text: node.text, accessibleName: node.name, classes: node.classes ?? [], id: node.id, index: index++ });
      }
    }
    return items;
  }

  async getViewportSize(): Promise<ViewportSize> {
    return { width: 1000, height: 800 };
  }

  async readPageContext(): Promise<PageContext> {
    const visible = this.visibleNodes();
    const summary = (kind: ControlSummary['kind']) => (node: FakeNode): ControlSummary => ({
      kind,
      text: node.text,
      accessibleName: node.name,
      id: node.id,
    });
    const menuCount = visible.filter(node => node.role === 'menu' || node.role === 'listbox').length;
    const modalCount = visible.filter(node => node.role === 'dialog').length;

    return {
      url: this.url,
      title: this.title,
      buttons: visible.filter(node => node.tag === 'button').map(summary('button')),
      links: visible.filter(node => node.tag === 'a').map(summary('link')),
      inputs: visible.filter(node => node.tag === 'input' || node.tag === 'textarea').map(summary('input')),
      selects: visible.filter(node => node.tag === 'select').map(summary('select')),
      menuItems: visible.filter(node => node.role === 'menuitem').map(summary('menuitem')),
      headings: visible.filter(node => node.tag === 'h1').map(node => node.text ?? ''),
      uiState: { hasModal: modalCount > 0, hasMenu: menuCount > 0, modalCount, menuCount },
    };
  }

  // SignalSource

  async readSignals(): Promise<UiSignals> {
    this.signalReads++;
    const loading = this.loadingReads > 0 ? 1 : 0;
    if (this.loadingReads > 0) this.loadingReads--;

    const visible = this.visibleNodes();
    return {
      url: this.url,
      title: this.title,
      modalCount: visible.filter(node => node.role === 'dialog').length,
      overlayCount: 0,
      activeElement: null,
      visibleForms: 0,
      loadingCount: loading,
      menuCount: visible.filter(node => node.role === 'menu' || node.role === 'listbox').length,
      bodyStructure: { childCount: visible.length, classes: '' },
    };
  }

  // BrowserPort

  async navigate(url: string): Promise<ActionResult> {
    this.actions.push(`navigate:${url}`);
    if (this.unreachableUrls.has(url)) {
      return failed(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    this.url = url;
    return ok();
  }

  async click(handle: ElementHandle, options: ClickOptions = {}): Promise<ActionResult> {
    const node = this.nodeOf(handle);
    this.actions.push(`click${options.force ? '(force)' : ''}:${node?.text ?? handle.label}`);
    if (!node) return failed('no node');

    const clickable = node.clickable ?? 'always';
    if (clickable === 'never' || (clickable === 'force-only' && !options.force)) {
      return failed('element intercepts pointer events');
    }
    this.focused = node;
    node.onClick?.(this);
    return ok();
  }

  async fill(handle: ElementHandle, value: string): Promise<ActionResult> {
    const node = this.nodeOf(handle);
    this.actions.push(`fill:${value}`);
    if (!node) return failed('no node');

    const fillable = node.fillable ?? (node.tag === 'input' || node.tag === 'textarea');
    if (!fillable) return failed('Element is not an <input>');
    node.value = value;
    return ok();
  }

  async hover(handle: ElementHandle): Promise<ActionResult> {
    const node = this.nodeOf(handle);
    this.actions.push(`hover:${node?.text ?? handle.label}`);
    return node ? ok() : failed('no node');
  }

  async pressKey(key: string): Promise<ActionResult> {
    this.actions.push(`press:${key}`);
    return ok();
  }

  async typeText(text: string): Promise<ActionResult> {
    this.actions.push(`type:${text}`);
    const target = this.focused;
    if (target && target.typeable === false) {
      return failed('element does not accept text');
    }
    if (target) target.value = text;
    return ok();
  }

  async wait(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async waitForStability(): Promise<void> {}

  async getCurrentUrl(): Promise<string> {
    return this.url;
  }

  // EvidencePort

  async captureState(stepName: string, taskId: string): Promise<EvidenceBundle> {
    if (this.failEvidence) {
      throw new Error('screenshot failed');
    }
    this.captures.push(stepName);
    return { viewport: `${taskId}/${stepName}.png` };
  }

  async captureErrorState(stepName: string, taskId: string): Promise<EvidenceBundle> {
    return this.captureState(stepName, taskId);
  }
}

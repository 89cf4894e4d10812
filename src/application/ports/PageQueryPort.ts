import { ElementDescriptor } from '../../domain/browser/ElementDescriptor';
import { MenuItemDescriptor } from '../../domain/browser/MenuItemDescriptor';
import { PageContext } from '../../domain/browser/PageContext';
import { ElementQuery } from '../../domain/resolution/ElementQuery';

/**
 * A lazily evaluated reference to zero or more nodes on the live page.
 */
export interface ElementHandle {
  /** Human readable description of how the handle was located */
  readonly label: string;

  /** Number of nodes the handle currently resolves to */
  count(): Promise<number>;

  /** Whether the first resolved node is rendered and visible */
  isVisible(): Promise<boolean>;

  /** A handle narrowed to the first resolved node */
  first(): ElementHandle;
}

export interface ViewportSize {
  width: number;
  height: number;
}

/**
 * Read-only introspection of the current page.
 */
export interface PageQueryPort {
  /**
   * Builds a handle for a query. Never throws for a query that matches nothing;
   * the returned handle then has a count of 0.
   */
  locate(query: ElementQuery): ElementHandle;

  /**
   * Visible interactive elements (buttons, links, inputs, role-bearing nodes).
   */
  enumerateInteractiveElements(): Promise<ElementDescriptor[]>;

  /**
   * Number of visible menu, listbox, dropdown or popover containers.
   */
  countVisibleMenuContainers(): Promise<number>;

  /**
   * Visible items inside the visible menu containers, in document order.
   */
  enumerateMenuItems(): Promise<MenuItemDescriptor[]>;

  getViewportSize(): Promise<ViewportSize>;

  readPageContext(): Promise<PageContext>;
}

/**
 * A visible item inside a transient menu, listbox, dropdown or popover.
 * Only produced while a menu container is visible.
 */
export interface MenuItemDescriptor {
  /** Trimmed text content */
  text: string;
  accessibleName?: string;
  classes: string[];
  id?: string;
  /** Position within the selector group it was enumerated from */
  index: number;
}

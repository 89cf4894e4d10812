/**
 * Summary of one visible control in a page context snapshot.
 */
export interface ControlSummary {
  kind: 'button' | 'link' | 'input' | 'select' | 'menuitem';
  text?: string;
  accessibleName?: string;
  id?: string;
  /** Input type ('contenteditable' for editable regions) */
  inputType?: string;
  placeholder?: string;
  href?: string;
}

/**
 * Detected transient UI patterns.
 */
export interface UiState {
  hasModal: boolean;
  hasMenu: boolean;
  modalCount: number;
  menuCount: number;
}

/**
 * Read-only structured snapshot of the interactive surface of a page.
 * Handed to the planner and consulted by the executor for menu visibility.
 */
export interface PageContext {
  url: string;
  title: string;
  buttons: ControlSummary[];
  links: ControlSummary[];
  inputs: ControlSummary[];
  selects: ControlSummary[];
  menuItems: ControlSummary[];
  headings: string[];
  uiState: UiState;
}

/**
 * A context with nothing visible, used when the page cannot be read.
 */
export function emptyPageContext(url = '', title = ''): PageContext {
  return {
    url,
    title,
    buttons: [],
    links: [],
    inputs: [],
    selects: [],
    menuItems: [],
    headings: [],
    uiState: { hasModal: false, hasMenu: false, modalCount: 0, menuCount: 0 },
  };
}

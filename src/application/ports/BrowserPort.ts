import { ElementHandle } from './PageQueryPort';

/**
 * Options for browser navigation.
 */
export interface NavigateOptions {
  /** Wait for navigation to complete */
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Options for click actions.
 */
export interface ClickOptions {
  /** Skip actionability checks (overlays, animations) */
  force?: boolean;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of a browser action.
 */
export interface ActionResult {
  /** Whether the action succeeded */
  success: boolean;
  /** Error message if action failed */
  error?: string;
  /** Duration of the action in milliseconds */
  duration: number;
}

/**
 * Port interface for the browser actions the executor drives.
 * Actions report failure through ActionResult instead of throwing.
 */
export interface BrowserPort {
  /**
   * Navigates to the specified URL.
   */
  navigate(url: string, options?: NavigateOptions): Promise<ActionResult>;

  /**
   * Clicks a resolved element.
   */
  click(handle: ElementHandle, options?: ClickOptions): Promise<ActionResult>;

  /**
   * Clears a form field and fills it with the value.
   */
  fill(handle: ElementHandle, value: string): Promise<ActionResult>;

  /**
   * Hovers over a resolved element.
   */
  hover(handle: ElementHandle): Promise<ActionResult>;

  /**
   * Presses a key or chord on the focused element, e.g. `Control+a`.
   */
  pressKey(key: string): Promise<ActionResult>;

  /**
   * Types text into the focused element key by key.
   */
  typeText(text: string): Promise<ActionResult>;

  /**
   * Suspends for a fixed time.
   */
  wait(ms: number): Promise<void>;

  /**
   * Waits until the network is idle, giving up silently after the timeout.
   */
  waitForStability(timeoutMs: number): Promise<void>;

  getCurrentUrl(): Promise<string>;
}

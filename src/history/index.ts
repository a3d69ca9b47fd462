/**
 * Navigation history.
 */

import { GeminiError } from '../errors';
import { Url } from '../types';

/**
 * Back stack of visited URLs, most recent on top.
 */
export class NavigationHistory {
  private readonly entries: Url[] = [];

  /** Number of entries. */
  get depth(): number {
    return this.entries.length;
  }

  /** Pushes a URL on top. */
  push(url: Url): void {
    this.entries.push({ ...url });
  }

  /**
   * Discards the current entry and returns the one beneath it, which
   * becomes the new top.
   */
  popForBack(): Url {
    if (!this.canGoBack()) {
      throw GeminiError.noHistory();
    }
    this.entries.pop();
    const previous = this.entries[this.entries.length - 1];
    if (previous === undefined) {
      throw GeminiError.noHistory();
    }
    return { ...previous };
  }

  /** Whether there is a page before the current one. */
  canGoBack(): boolean {
    return this.entries.length > 1;
  }

  /** The top entry. */
  current(): Url | undefined {
    const top = this.entries[this.entries.length - 1];
    return top === undefined ? undefined : { ...top };
  }

  /** Entries from oldest to newest. */
  toArray(): Url[] {
    return this.entries.map((url) => ({ ...url }));
  }

  /** Removes every entry. */
  clear(): void {
    this.entries.length = 0;
  }
}

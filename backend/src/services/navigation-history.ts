/**
 * Browser-style history of visited directories.
 *
 * `offset` counts how far the cursor sits behind the most recent entry, so
 * the current directory is `stack[stack.length - 1 - offset]`. Visiting a new
 * directory while `offset > 0` drops the abandoned forward entries.
 */
export class NavigationHistory {
  private stack: string[] = [];
  private offset = 0;

  current(): string | null {
    return this.stack[this.stack.length - 1 - this.offset] ?? null;
  }

  /**
   * Push `path` as the new current directory. Returns false when `path` is
   * already current.
   */
  navigateTo(path: string): boolean {
    if (this.current() === path) return false;

    if (this.offset > 0) {
      this.stack.splice(this.stack.length - this.offset);
    }

    this.stack.push(path);
    this.offset = 0;
    return true;
  }

  canGoBack(): boolean {
    return this.offset + 1 < this.stack.length;
  }

  canGoForward(): boolean {
    return this.offset > 0;
  }

  back(): boolean {
    if (!this.canGoBack()) return false;
    this.offset++;
    return true;
  }

  forward(): boolean {
    if (!this.canGoForward()) return false;
    this.offset--;
    return true;
  }

  clear(): void {
    this.stack = [];
    this.offset = 0;
  }

  entries(): readonly string[] {
    return this.stack;
  }

  position(): number {
    return this.offset;
  }
}

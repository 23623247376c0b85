/**
 * HTML id helpers
 */

/**
 * Turn a string into a valid HTML id.
 */
export function cleanHtmlId(value: string): string {
  return value
    .toLowerCase()
    .replace(/[ _[\]]/g, '-')
    .replace(/[^a-z0-9\-_]/g, '')
    .replace(/-+/g, '-');
}

/**
 * Hands out ids that are unique within one page render. A repeated value
 * gets a `--2`, `--3`, ... suffix.
 */
export class HtmlIdGenerator {
  private seen: Map<string, number> = new Map();

  getUniqueId(value: string): string {
    const id = cleanHtmlId(value);
    const count = this.seen.get(id);
    if (count === undefined) {
      this.seen.set(id, 1);
      return id;
    }
    this.seen.set(id, count + 1);
    return `${id}--${count + 1}`;
  }

  reset(): void {
    this.seen.clear();
  }
}

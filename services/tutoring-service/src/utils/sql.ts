/**
 * Pattern for a case-insensitive "contains" match with ILIKE.
 * Escapes the LIKE wildcards so user input matches literally.
 */
export function containsPattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

/**
 * Accumulates WHERE conditions with numbered placeholders.
 */
export class QueryConditions {
  readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  /** Register a value and return its placeholder. */
  param(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  add(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  get whereClause(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

/**
 * Placeholder key -> spreadsheet column address, in file order.
 * Addresses, empty ones included, are checked by the validator, not here.
 */
export class FieldMappingVO {
  private readonly columns: ReadonlyMap<string, string>;

  private constructor(columns: Map<string, string>) {
    this.columns = columns;
    this.validate();
  }

  private validate(): void {
    for (const key of this.columns.keys()) {
      if (!key.trim()) {
        throw new Error('Placeholder key is required');
      }
    }
  }

  static create(source: Record<string, string>): FieldMappingVO {
    const columns = new Map<string, string>();
    for (const [key, address] of Object.entries(source)) {
      columns.set(key, address.trim());
    }
    return new FieldMappingVO(columns);
  }

  get size(): number {
    return this.columns.size;
  }

  get isEmpty(): boolean {
    return this.columns.size === 0;
  }

  keys(): string[] {
    return Array.from(this.columns.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.columns.entries());
  }

  columnOf(key: string): string | undefined {
    return this.columns.get(key);
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.columns);
  }
}

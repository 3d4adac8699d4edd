import { Decimal } from 'decimal.js';

/**
 * Immutable area -> population lookup, built once per run and passed to
 * whatever needs it.
 */
export class PopulationTable {
  private readonly entries: ReadonlyMap<string, Decimal>;

  private constructor(entries: ReadonlyMap<string, Decimal>) {
    this.entries = entries;
  }

  /**
   * Later entries for the same area replace earlier ones.
   */
  static fromEntries(entries: Iterable<readonly [string, Decimal.Value]>): PopulationTable {
    const map = new Map<string, Decimal>();
    for (const [area, population] of entries) {
      map.set(area, new Decimal(population));
    }
    return new PopulationTable(map);
  }

  get(area: string): Decimal | undefined {
    return this.entries.get(area);
  }

  has(area: string): boolean {
    return this.entries.has(area);
  }

  get size(): number {
    return this.entries.size;
  }
}

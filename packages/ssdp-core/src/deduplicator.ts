import type { DiscoveryResult, ServiceRecord } from './types';

/**
 * @hebrew מאחד תגובות חוזרות מאותו שירות לרשומה אחת. התגובה הראשונה מנצחת.
 *
 * המפתח הוא ה-USN אם קיים, אחרת ה-LOCATION. רשומה בלי שניהם נחשבת תמיד ייחודית.
 * סדר התוצאה הוא סדר ההגעה של התגובה הראשונה מכל שירות, וזו ערובת הסדר היחידה.
 */
export class ServiceDeduplicator {
  private readonly seen = new Map<string, ServiceRecord>();
  private readonly ordered: ServiceRecord[] = [];

  static keyOf(record: ServiceRecord): string | undefined {
    if (record.usn) return `usn:${record.usn}`;
    if (record.location) return `location:${record.location}`;
    return undefined;
  }

  /**
   * @returns true if the record was inserted, false if an earlier reply already holds its key.
   */
  add(record: ServiceRecord): boolean {
    const key = ServiceDeduplicator.keyOf(record);
    if (key !== undefined) {
      if (this.seen.has(key)) return false;
      this.seen.set(key, record);
    }
    this.ordered.push(record);
    return true;
  }

  has(record: ServiceRecord): boolean {
    const key = ServiceDeduplicator.keyOf(record);
    return key === undefined ? this.ordered.includes(record) : this.seen.has(key);
  }

  get size(): number {
    return this.ordered.length;
  }

  toResult(): DiscoveryResult {
    return Object.freeze([...this.ordered]);
  }
}

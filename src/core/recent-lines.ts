import { createHash } from 'crypto';

/**
 * Fixed-capacity FIFO of line hashes. Once full, remembering a new line
 * forgets the oldest one.
 */
export class RecentLineSet {
  private readonly slots: (string | undefined)[];
  private readonly members = new Set<string>();
  private next = 0;

  constructor(readonly capacity = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<string | undefined>(capacity).fill(undefined);
  }

  static hash(line: string): string {
    return createHash('sha1').update(line.trim()).digest('hex');
  }

  get size(): number {
    return this.members.size;
  }

  has(line: string): boolean {
    return this.members.has(RecentLineSet.hash(line));
  }

  /**
   * Record a line. Returns false when it was already among the recent lines,
   * in which case nothing changes.
   */
  remember(line: string): boolean {
    const digest = RecentLineSet.hash(line);
    if (this.members.has(digest)) {
      return false;
    }

    const evicted = this.slots[this.next];
    if (evicted !== undefined) {
      this.members.delete(evicted);
    }

    this.slots[this.next] = digest;
    this.members.add(digest);
    this.next = (this.next + 1) % this.capacity;
    return true;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.members.clear();
    this.next = 0;
  }
}

export default RecentLineSet;

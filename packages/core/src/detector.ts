import { DetectionError, NotifyError } from './errors';
import type { ChangeSource, Detection, Tenant } from './types';

const NO_CHANGE: Detection = Object.freeze({ changed: false, topics: Object.freeze([]) });

/**
 * Tracks one tenant's high-water mark and reports topics changed past it.
 *
 * The first successful poll only primes the mark. The mark moves only after
 * the connection for that poll has been released, and never moves backwards.
 */
export class ChangeDetector {
  private mark: number | null = null;

  constructor(private readonly source: ChangeSource) {}

  get tenant(): Tenant {
    return this.source.tenant;
  }

  /** Last accounted-for marker, or null before the first successful poll. */
  get highWaterMark(): number | null {
    return this.mark;
  }

  async detect(): Promise<Detection> {
    try {
      const { mark, detection } = await this.readDelta();
      this.mark = mark;
      return detection;
    } catch (err) {
      throw new DetectionError(this.tenant, err);
    }
  }

  /** Forget the mark; the next poll primes it again. */
  reset(): void {
    this.mark = null;
  }

  private async readDelta(): Promise<{ mark: number; detection: Detection }> {
    const conn = await this.source.open();
    try {
      const current = await conn.currentChangeMarker();
      if (!Number.isSafeInteger(current) || current < 0) {
        throw new NotifyError(`invalid change marker: ${current}`);
      }
      if (this.mark === null) return { mark: current, detection: NO_CHANGE };
      if (current <= this.mark) return { mark: this.mark, detection: NO_CHANGE };
      const topics = await conn.topicsChangedSince(this.mark);
      return { mark: current, detection: { changed: true, topics: normalizeTopics(topics) } };
    } finally {
      await conn.close();
    }
  }
}

function normalizeTopics(topics: readonly string[]): string[] {
  return Array.from(new Set(topics)).sort();
}

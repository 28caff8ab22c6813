import type { ChangeConnection, ChangeSource, Tenant } from '../types';

type Row = { marker: number; topic: string };

/** In-process change source for tests: rows carry an increasing marker. */
export class MemorySource implements ChangeSource {
  readonly rows: Row[] = [];
  opened = 0;
  closed = 0;
  failOpen: Error | null = null;
  failTopics: Error | null = null;

  constructor(readonly tenant: Tenant = 'lab1') {}

  /** Append one row per topic and return the last marker written. */
  write(...topics: string[]): number {
    let marker = this.maxMarker();
    for (const topic of topics) {
      marker++;
      this.rows.push({ marker, topic });
    }
    return marker;
  }

  open(): ChangeConnection {
    if (this.failOpen) throw this.failOpen;
    this.opened++;
    return {
      currentChangeMarker: () => this.maxMarker(),
      topicsChangedSince: (marker: number) => {
        if (this.failTopics) throw this.failTopics;
        return this.rows.filter(r => r.marker > marker).map(r => r.topic);
      },
      close: () => {
        this.closed++;
      },
    };
  }

  private maxMarker(): number {
    return this.rows.reduce((max, r) => Math.max(max, r.marker), 0);
  }
}

export async function waitFor(pred: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now();
  while (!pred()) {
    if (Date.now() - start > timeoutMs) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise(r => setTimeout(r, 5));
  }
}

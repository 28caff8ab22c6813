import { describe, it, expect } from 'vitest';
import { ChangeDetector } from './detector';
import { DetectionError } from './errors';
import { MemorySource } from './testing/memory-source';

describe('ChangeDetector', () => {
  it('first poll primes the mark and reports nothing, whatever the history', async () => {
    const src = new MemorySource();
    src.write('temperature', 'pressure', 'humidity');
    const d = new ChangeDetector(src);
    expect(d.highWaterMark).toBeNull();
    expect(await d.detect()).toEqual({ changed: false, topics: [] });
    expect(d.highWaterMark).toBe(3);
  });

  it('primes to 0 on an empty store', async () => {
    const d = new ChangeDetector(new MemorySource());
    expect(await d.detect()).toEqual({ changed: false, topics: [] });
    expect(d.highWaterMark).toBe(0);
  });

  it('reports distinct topics written since the mark, sorted, and advances the mark', async () => {
    const src = new MemorySource();
    src.write('a');
    const d = new ChangeDetector(src);
    await d.detect();
    src.write('temperature', 'ph', 'temperature', 'conductivity');
    expect(await d.detect()).toEqual({ changed: true, topics: ['conductivity', 'ph', 'temperature'] });
    expect(d.highWaterMark).toBe(5);
  });

  it('returns no change and keeps the mark when nothing was written', async () => {
    const src = new MemorySource();
    src.write('a', 'b');
    const d = new ChangeDetector(src);
    await d.detect();
    expect(await d.detect()).toEqual({ changed: false, topics: [] });
    expect(d.highWaterMark).toBe(2);
  });

  it('never moves the mark backwards', async () => {
    const src = new MemorySource();
    src.write('a', 'b', 'c');
    const d = new ChangeDetector(src);
    await d.detect();
    src.rows.splice(1);
    expect(await d.detect()).toEqual({ changed: false, topics: [] });
    expect(d.highWaterMark).toBe(3);
  });

  it('wraps open failures and leaves the mark untouched', async () => {
    const src = new MemorySource();
    src.write('a');
    const d = new ChangeDetector(src);
    await d.detect();
    src.write('b');
    src.failOpen = new Error('database is locked');
    await expect(d.detect()).rejects.toMatchObject({
      name: 'DetectionError',
      tenant: 'lab1',
      message: 'change detection failed for project "lab1": database is locked',
    });
    expect(d.highWaterMark).toBe(1);
    src.failOpen = null;
    expect(await d.detect()).toEqual({ changed: true, topics: ['b'] });
  });

  it('releases the connection when a query fails, without partial update', async () => {
    const src = new MemorySource();
    src.write('a');
    const d = new ChangeDetector(src);
    await d.detect();
    src.write('b');
    src.failTopics = new Error('no such table: _param_def');
    await expect(d.detect()).rejects.toBeInstanceOf(DetectionError);
    expect(src.opened).toBe(2);
    expect(src.closed).toBe(2);
    expect(d.highWaterMark).toBe(1);
  });

  it('reset() makes the next poll prime again', async () => {
    const src = new MemorySource();
    const d = new ChangeDetector(src);
    await d.detect();
    src.write('a');
    d.reset();
    expect(await d.detect()).toEqual({ changed: false, topics: [] });
    expect(d.highWaterMark).toBe(1);
  });
});

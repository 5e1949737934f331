import { describe, expect, it } from 'vitest';

import { KeywordSplitter } from '../core/keyword-splitter.js';
import { MemoryLineSink } from './helpers/memory-sink.js';
import { toSourceLines } from './helpers/source-lines.js';

const createSinks = (...keywords: string[]): Map<string, MemoryLineSink> =>
  new Map(keywords.map((keyword) => [keyword, new MemoryLineSink(`run.${keyword}.log`)]));

const feed = async (splitter: KeywordSplitter, raws: string[], lastHasNewline = true): Promise<number> => {
  let written = 0;
  for (const line of toSourceLines(raws, lastHasNewline)) {
    written += await splitter.accept(line);
  }
  return written + (await splitter.flush());
};

describe('KeywordSplitter', () => {
  it('routes a line to the earliest listed keyword only', async () => {
    const sinks = createSinks('WARN', 'ERROR');
    const splitter = new KeywordSplitter(sinks, { compact: false });
    await feed(splitter, ['10 ERROR and WARN together']);
    expect(sinks.get('WARN')?.text()).toBe('10 ERROR and WARN together\n');
    expect(sinks.get('ERROR')?.text()).toBe('');
  });

  it('drops lines matching no keyword', async () => {
    const sinks = createSinks('ERROR');
    const splitter = new KeywordSplitter(sinks, { compact: false });
    const written = await feed(splitter, ['INFO fine', 'ERROR bad', 'error lowercase']);
    expect(written).toBe(1);
    expect(sinks.get('ERROR')?.text()).toBe('ERROR bad\n');
  });

  it('writes lines verbatim when not compacting', async () => {
    const sinks = createSinks('db');
    const splitter = new KeywordSplitter(sinks, { compact: false });
    await feed(splitter, ['db up', 'db up', 'db down'], false);
    expect(sinks.get('db')?.text()).toBe('db up\ndb up\ndb down');
  });

  it('compacts each keyword stream independently', async () => {
    const sinks = createSinks('ERROR', 'WARN');
    const splitter = new KeywordSplitter(sinks, { compact: true });
    const written = await feed(splitter, [
      'ERROR disk',
      'WARN cpu',
      'ERROR disk',
      'ERROR disk',
      'INFO skipped',
    ]);
    expect(written).toBe(2);
    expect(sinks.get('ERROR')?.text()).toBe('ERROR disk (x3)\n');
    expect(sinks.get('WARN')?.text()).toBe('WARN cpu\n');
    expect(splitter.routedCounts()).toEqual({ ERROR: 3, WARN: 1 });
  });

  it('terminates compacted records even when the input does not', async () => {
    const sinks = createSinks('x');
    const splitter = new KeywordSplitter(sinks, { compact: true });
    await feed(splitter, ['x 1', 'x 1'], false);
    expect(sinks.get('x')?.text()).toBe('x 1 (x2)\n');
  });
});

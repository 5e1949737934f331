import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EmptyKeywordListError } from '../core/errors.js';
import { resolveMode, runCompactLog } from '../runner/compact-log.js';
import type { RunStartInfo, RunSummary } from '../types/observer.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(join(tmpdir(), 'compact-log-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const writeInput = async (content: string): Promise<string> => {
  const path = join(dir, 'input.log');
  await fs.writeFile(path, content, 'utf8');
  return path;
};

const read = (path: string): Promise<string> => fs.readFile(path, 'utf8');

describe('resolveMode', () => {
  it('maps the split and compact flags to a mode', () => {
    expect(resolveMode(false, false)).toBe('copy');
    expect(resolveMode(false, true)).toBe('compact');
    expect(resolveMode(true, false)).toBe('split');
    expect(resolveMode(true, true)).toBe('split-compact');
  });
});

describe('runCompactLog', () => {
  it('copies the lines inside the range byte for byte', async () => {
    const inputPath = await writeInput('100 start\nnoise\n105 work\n200 late\n110 tail');
    const outputPath = join(dir, 'copy.log');
    const result = await runCompactLog({
      inputPath,
      outputPath,
      bounds: { lines: { start: 1 }, timestamps: { start: 100, end: 150 } },
    });
    expect(await read(outputPath)).toBe('100 start\n105 work\n110 tail');
    expect(result.mode).toBe('copy');
    expect(result.linesRead).toBe(5);
    expect(result.recordsWritten).toBe(3);
  });

  it('copies everything when unbounded', async () => {
    const content = 'a\n\nb\r\nc\n';
    const inputPath = await writeInput(content);
    const outputPath = join(dir, 'all.log');
    await runCompactLog({ inputPath, outputPath });
    expect(await read(outputPath)).toBe('a\n\nb\nc\n');
  });

  it('compacts a whole file', async () => {
    const inputPath = await writeInput('1 boot\n10.0 tick\n20.0 tick\nshutdown 4\n');
    const outputPath = join(dir, 'compact.log');
    const result = await runCompactLog({ inputPath, outputPath, compact: true });
    expect(await read(outputPath)).toBe('1 boot\n tick (x2, TS: 10.000-20.000)\nshutdown 4\n');
    expect(result.recordsWritten).toBe(3);
  });

  it('filters after grouping in compact mode but before grouping when splitting', async () => {
    const inputPath = await writeInput('5 retry\n50 retry\n6 retry\n');
    const bounds = { lines: { start: 1 }, timestamps: { start: 0, end: 10 } };

    const compactPath = join(dir, 'compact.log');
    await runCompactLog({ inputPath, outputPath: compactPath, compact: true, bounds });
    expect(await read(compactPath)).toBe(' retry (x2, TS: 5.000-6.000)\n');

    await runCompactLog({
      inputPath,
      outputPath: join(dir, 'split'),
      compact: true,
      keywords: ['retry'],
      bounds,
    });
    expect(await read(join(dir, 'split.retry.log'))).toBe('5 retry\n6 retry\n');
  });

  it('splits into per-keyword files under new directories', async () => {
    const inputPath = await writeInput('1 WARN slow\n2 ERROR and WARN\n3 INFO ok\n4 ERROR down\n');
    const base = join(dir, 'nested', 'deeper', 'run.log');
    const result = await runCompactLog({
      inputPath,
      outputPath: base,
      keywords: ['WARN', 'ERROR', 'DEBUG'],
    });
    const warnPath = join(dir, 'nested', 'deeper', 'run.WARN.log');
    const errorPath = join(dir, 'nested', 'deeper', 'run.ERROR.log');
    const debugPath = join(dir, 'nested', 'deeper', 'run.DEBUG.log');
    expect(result.outputPaths).toEqual([warnPath, errorPath, debugPath]);
    expect(await read(warnPath)).toBe('1 WARN slow\n2 ERROR and WARN\n');
    expect(await read(errorPath)).toBe('4 ERROR down\n');
    expect(await read(debugPath)).toBe('');
    expect(result.keywordCounts).toEqual({ WARN: 2, ERROR: 1, DEBUG: 0 });
  });

  it('compacts each keyword file on its own', async () => {
    const inputPath = await writeInput('ERROR disk\nWARN cpu\nERROR disk\nERROR disk\n');
    await runCompactLog({
      inputPath,
      outputPath: join(dir, 'run'),
      compact: true,
      keywords: ['ERROR', 'WARN'],
    });
    expect(await read(join(dir, 'run.ERROR.log'))).toBe('ERROR disk (x3)\n');
    expect(await read(join(dir, 'run.WARN.log'))).toBe('WARN cpu\n');
  });

  it('refuses an empty keyword list before touching the disk', async () => {
    const outputPath = join(dir, 'never');
    await expect(
      runCompactLog({ inputPath: join(dir, 'missing.log'), outputPath, keywords: [] }),
    ).rejects.toBeInstanceOf(EmptyKeywordListError);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('propagates a missing input after creating the output directory only', async () => {
    const outputPath = join(dir, 'out', 'copy.log');
    await expect(
      runCompactLog({ inputPath: join(dir, 'missing.log'), outputPath }),
    ).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await fs.readdir(dir)).toEqual(['out']);
    expect(await fs.readdir(join(dir, 'out'))).toEqual([]);
  });

  it('creates every keyword file directory before reading', async () => {
    const outputPath = join(dir, 'nested', 'deep', 'split.log');
    await expect(
      runCompactLog({ inputPath: join(dir, 'missing.log'), outputPath, keywords: ['ERROR', 'WARN'] }),
    ).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await fs.readdir(join(dir, 'nested', 'deep'))).toEqual([]);
  });

  it('fails on input that is not valid UTF-8', async () => {
    const inputPath = join(dir, 'latin1.log');
    await fs.writeFile(inputPath, Buffer.from([0x31, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x0a]));
    const outputPath = join(dir, 'copy.log');
    await expect(runCompactLog({ inputPath, outputPath })).rejects.toBeInstanceOf(TypeError);
  });

  it('reads old Mac line endings', async () => {
    const inputPath = await writeInput('1 a\r2 b\r');
    const outputPath = join(dir, 'cr.log');
    const result = await runCompactLog({ inputPath, outputPath });
    expect(await read(outputPath)).toBe('1 a\n2 b\n');
    expect(result.linesRead).toBe(2);
  });

  it('reports start, progress and completion to the observer', async () => {
    const inputPath = await writeInput('a\nb\nc\nd\ne\n');
    const outputPath = join(dir, 'observed.log');
    const starts: RunStartInfo[] = [];
    const progress: number[] = [];
    const summaries: RunSummary[] = [];
    await runCompactLog({
      inputPath,
      outputPath,
      progressInterval: 2,
      observer: {
        onStart: (info) => starts.push(info),
        onProgress: (info) => progress.push(info.linesRead),
        onComplete: (summary) => summaries.push(summary),
      },
    });
    expect(starts).toEqual([{ mode: 'copy', inputPath, outputPaths: [outputPath] }]);
    expect(progress).toEqual([2, 4, 5]);
    expect(summaries).toEqual([
      {
        mode: 'copy',
        inputPath,
        outputPaths: [outputPath],
        linesRead: 5,
        recordsWritten: 5,
        keywordCounts: undefined,
      },
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { resultsFilename, writeResults } from '../src/results.js';

describe('resultsFilename', () => {
  it('stamps the local date and time', () => {
    expect(resultsFilename('tournament_results', new Date(2026, 9, 18, 9, 5, 7))).toBe(
      'tournament_results_20261018_090507.txt',
    );
  });
});

describe('writeResults', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'results-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the output directory and writes a timestamped file', () => {
    const outDir = path.join(dir, 'nested', 'logs');
    const file = writeResults(outDir, 'hello\n', { now: new Date(2026, 0, 2, 3, 4, 5) });

    expect(file).toBe(path.join(outDir, 'tournament_results_20260102_030405.txt'));
    expect(readFileSync(file, 'utf-8')).toBe('hello\n');
  });

  it('uses the given file name and prefix', () => {
    expect(writeResults(dir, 'x', { filename: 'out.txt' })).toBe(path.join(dir, 'out.txt'));
    const file = writeResults(dir, 'y', { prefix: 'match_results', now: new Date(2026, 0, 2, 3, 4, 5) });
    expect(path.basename(file)).toBe('match_results_20260102_030405.txt');
    expect(existsSync(file)).toBe(true);
  });
});

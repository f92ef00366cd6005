import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { delimiter, join } from 'path';
import { findExecutable, hasMissing, missingRequirements } from '../../requirements.js';

describe('skill requirements', () => {
  let root: string;
  let binA: string;
  let binB: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'nanobot-bins-'));
    binA = join(root, 'a');
    binB = join(root, 'b');
    mkdirSync(binA);
    mkdirSync(binB);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writeBin(dir: string, name: string, mode = 0o755): string {
    const path = join(dir, name);
    writeFileSync(path, '#!/bin/sh\nexit 0\n');
    chmodSync(path, mode);
    return path;
  }

  describe('findExecutable', () => {
    it('returns the first match in PATH order', () => {
      writeBin(binA, 'fetcher');
      const second = writeBin(binB, 'fetcher');

      expect(findExecutable('fetcher', { PATH: [binB, binA].join(delimiter) })).toBe(second);
    });

    it('skips files that are not executable', () => {
      writeBin(binA, 'fetcher', 0o644);
      const executable = writeBin(binB, 'fetcher');

      expect(findExecutable('fetcher', { PATH: [binA, binB].join(delimiter) })).toBe(executable);
    });

    it('skips directories with the same name', () => {
      mkdirSync(join(binA, 'fetcher'));

      expect(findExecutable('fetcher', { PATH: binA })).toBeNull();
    });

    it('checks absolute paths directly', () => {
      const path = writeBin(binA, 'fetcher');

      expect(findExecutable(path, {})).toBe(path);
      expect(findExecutable(join(binA, 'missing'), {})).toBeNull();
    });

    it('finds nothing without PATH', () => {
      writeBin(binA, 'fetcher');
      expect(findExecutable('fetcher', {})).toBeNull();
    });
  });

  describe('missingRequirements', () => {
    it('lists unset variables and executables not on PATH', () => {
      writeBin(binA, 'fetcher');

      const missing = missingRequirements(
        { env: ['ALEXZO_API_KEY', 'REGION'], bins: ['fetcher', 'renderer'] },
        { ALEXZO_API_KEY: 'test-key', PATH: binA }
      );

      expect(missing).toEqual({ env: ['REGION'], bins: ['renderer'] });
      expect(hasMissing(missing)).toBe(true);
    });

    it('reports nothing when every requirement is met', () => {
      writeBin(binA, 'fetcher');

      const missing = missingRequirements({ env: ['REGION'], bins: ['fetcher'] }, { REGION: 'eu', PATH: binA });

      expect(missing).toEqual({ env: [], bins: [] });
      expect(hasMissing(missing)).toBe(false);
    });
  });
});

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  type ExampleWorkspace,
  makeExampleWorkspace,
} from '@/test-support/examples';

import { discoverExamples, exampleName, selectExamples } from './discover';

describe('exampleName', () => {
  it('strips directory and extension', () => {
    expect(exampleName('/repo/examples/soft-shadows.rs')).toBe('soft-shadows');
    expect(exampleName('examples/robot_alarm_clock.rs')).toBe(
      'robot_alarm_clock',
    );
  });
});

describe('discoverExamples', () => {
  let ws: ExampleWorkspace;

  beforeEach(async () => {
    ws = await makeExampleWorkspace(['simple', 'cube', 'hier']);
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('sorts lexically when asked', async () => {
    const found = await discoverExamples(ws.root, 'examples', '*.rs', true);
    expect(found.map((e) => e.name)).toEqual(['cube', 'hier', 'simple']);
    expect(found[0]?.path).toBe(path.join(ws.root, 'examples', 'cube.rs'));
  });

  it('finds each matching file exactly once in glob order', async () => {
    const found = await discoverExamples(ws.root, 'examples', '*.rs');
    expect([...found.map((e) => e.name)].sort()).toEqual([
      'cube',
      'hier',
      'simple',
    ]);
  });

  it('ignores non-matching files, directories and nested files', async () => {
    await writeFile(path.join(ws.root, 'examples', 'README.md'), '# x\n');
    await mkdir(path.join(ws.root, 'examples', 'assets.rs'));
    await mkdir(path.join(ws.root, 'examples', 'nested'));
    await writeFile(path.join(ws.root, 'examples', 'nested', 'deep.rs'), '');
    const found = await discoverExamples(ws.root, 'examples', '*.rs', true);
    expect(found.map((e) => e.name)).toEqual(['cube', 'hier', 'simple']);
  });

  it('returns [] when the directory does not exist', async () => {
    expect(await discoverExamples(ws.root, 'missing', '*.rs')).toEqual([]);
  });

  it('returns [] when nothing matches', async () => {
    expect(await discoverExamples(ws.root, 'examples', '*.ts')).toEqual([]);
  });
});

describe('selectExamples', () => {
  const list = ['c', 'a', 'b'].map((name) => ({ name, path: `/x/${name}.rs` }));

  it('returns everything without a selection', () => {
    expect(selectExamples(list).map((e) => e.name)).toEqual(['c', 'a', 'b']);
  });

  it('keeps discovery order for select and except', () => {
    expect(
      selectExamples(list, { select: ['b', 'c'] }).map((e) => e.name),
    ).toEqual(['c', 'b']);
    expect(selectExamples(list, { except: ['a'] }).map((e) => e.name)).toEqual(
      ['c', 'b'],
    );
    expect(
      selectExamples(list, { select: ['a', 'b'], except: ['b'] }).map(
        (e) => e.name,
      ),
    ).toEqual(['a']);
  });

  it('warns once about unknown names', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      const out = selectExamples(list, { select: ['a', 'zz'], except: ['zz'] });
      expect(out.map((e) => e.name)).toEqual(['a']);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith('examples: unknown example(s): zz');
    } finally {
      logSpy.mockRestore();
    }
  });
});

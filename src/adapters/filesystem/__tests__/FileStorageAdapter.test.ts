import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileStorageAdapter } from '../FileStorageAdapter';

describe('FileStorageAdapter', () => {
  let baseDir: string;
  let adapter: FileStorageAdapter;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'drillbook-'));
    adapter = new FileStorageAdapter(baseDir);
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('stores each key as a JSON file', async () => {
    await adapter.write('results/geo', { version: 1 });

    expect(JSON.parse(readFileSync(join(baseDir, 'results', 'geo.json'), 'utf-8'))).toEqual({ version: 1 });
    expect(await adapter.read('results/geo')).toEqual({ version: 1 });
  });

  it('leaves no temporary files behind', async () => {
    await adapter.write('results/geo', { n: 1 });
    await adapter.write('results/geo', { n: 2 });

    expect(readdirSync(join(baseDir, 'results'))).toEqual(['geo.json']);
    expect(await adapter.read('results/geo')).toEqual({ n: 2 });
  });

  it('writes large values completely', async () => {
    const records = Array.from({ length: 50_000 }, (_, i) => ({ id: `q${i}`, score: i % 2 }));
    await adapter.write('results/large', { records });

    expect(await adapter.read('results/large')).toEqual({ records });
  });

  it('returns null for a missing key', async () => {
    expect(await adapter.read('missing')).toBeNull();
    expect(await adapter.exists('missing')).toBe(false);
  });

  it('rejects a stored value that is not JSON', async () => {
    writeFileSync(join(baseDir, 'broken.json'), '{ not json');
    await expect(adapter.read('broken')).rejects.toThrow("Stored value for 'broken' is not valid JSON");
  });

  it('lists nested keys', async () => {
    await adapter.write('a', 1);
    await adapter.write('results/b', 2);
    expect((await adapter.keys()).sort()).toEqual(['a', 'results/b']);
  });

  it('deletes and clears', async () => {
    await adapter.write('a', 1);
    await adapter.write('b', 2);
    await adapter.delete('a');
    expect(await adapter.keys()).toEqual(['b']);

    await adapter.clear();
    expect(await adapter.keys()).toEqual([]);
  });
});

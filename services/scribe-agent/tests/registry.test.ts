import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ParticipantRegistry, loadParticipantMap } from '../src/registry/participant-registry.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadParticipantMap', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'participants-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeMap(contents: string): Promise<string> {
    const file = path.join(dir, 'participants.json');
    await writeFile(file, contents, 'utf-8');
    return file;
  }

  it('reads speaker ids and trims display names', async () => {
    const file = await writeMap(JSON.stringify({ 'user-4f2a': ' Alice ', '42': 'Bob' }));

    const names = await loadParticipantMap(file);

    expect(Array.from(names.entries())).toEqual([
      ['42', 'Bob'],
      ['user-4f2a', 'Alice'],
    ]);
  });

  it('skips entries that are not non-empty strings', async () => {
    const file = await writeMap(JSON.stringify({ a: 'Ann', b: 7, c: '   ', d: null }));

    const names = await loadParticipantMap(file);

    expect(names.size).toBe(1);
    expect(names.get('a')).toBe('Ann');
    expect(console.warn).toHaveBeenCalledTimes(3);
  });

  it('rejects invalid JSON', async () => {
    const file = await writeMap('{ "a": ');

    await expect(loadParticipantMap(file)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a top-level array', async () => {
    const file = await writeMap('["Alice"]');

    await expect(loadParticipantMap(file)).rejects.toThrow(`Participant map ${file} must be a JSON object`);
  });
});

describe('ParticipantRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('resolves mapped names and falls back to the raw id', async () => {
    const registry = new ParticipantRegistry({
      path: 'participants.json',
      loader: async () => new Map([['user-1', 'Alice']]),
    });

    await expect(registry.reload()).resolves.toBe(1);

    expect(registry.resolve('user-1')).toBe('Alice');
    expect(registry.resolve('user-2')).toBe('user-2');
  });

  it('warns once per unknown speaker', () => {
    const registry = new ParticipantRegistry();

    registry.resolve('42');
    registry.resolve('42');
    registry.resolve('43');

    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(
      '[Participants] ⚠️ No display name for speaker 42, using raw id'
    );
  });

  it('falls back to an empty map when the file cannot be loaded', async () => {
    const loader = vi.fn(async (_path: string): Promise<Map<string, string>> => {
      throw new Error('ENOENT');
    });
    const registry = new ParticipantRegistry({ path: 'missing.json', loader });

    await expect(registry.reload()).resolves.toBe(0);

    expect(loader).toHaveBeenCalledWith('missing.json');
    expect(registry.size).toBe(0);
    expect(registry.resolve('user-1')).toBe('user-1');
  });

  it('uses raw ids when no map is configured', async () => {
    const loader = vi.fn(async (_path: string) => new Map<string, string>());
    const registry = new ParticipantRegistry({ loader });

    await expect(registry.reload()).resolves.toBe(0);
    expect(loader).not.toHaveBeenCalled();
  });

  it('remembers a newly loaded path and hands out independent snapshots', async () => {
    const registry = new ParticipantRegistry({
      loader: async (file) => new Map([['u', file]]),
    });

    await registry.reload('team.json');
    const snapshot = registry.snapshot();
    await registry.reload('other.json');

    expect(registry.path).toBe('other.json');
    expect(snapshot.get('u')).toBe('team.json');
    expect(registry.resolve('u')).toBe('other.json');
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { WhitelistStore, addToWhitelist, parseWhitelist, removeFromWhitelist } from '../whitelist.js';

describe('parseWhitelist', () => {
  it('reads one ID per line, ignoring comments and blank lines', () => {
    const { ids, invalid } = parseWhitelist('# owners\n123456789 # alice\n\n  987654321  \n');

    expect([...ids]).toEqual([123456789, 987654321]);
    expect(invalid).toEqual([]);
  });

  it('reports entries that are not user IDs with their line number', () => {
    const { ids, invalid } = parseWhitelist('111\n@bob\n-5\n0\n');

    expect([...ids]).toEqual([111]);
    expect(invalid).toEqual([
      { line: 2, text: '@bob' },
      { line: 3, text: '-5' },
      { line: 4, text: '0' },
    ]);
  });

  it('handles CRLF line endings', () => {
    expect([...parseWhitelist('1\r\n2\r\n').ids]).toEqual([1, 2]);
  });

  it('treats placeholder-only content as empty', () => {
    expect(parseWhitelist('# Add your Telegram user IDs here\n').ids.size).toBe(0);
  });
});

describe('addToWhitelist', () => {
  it('appends the ID with an optional comment', () => {
    expect(addToWhitelist('# users\n', 42, 'alice')).toBe('# users\n42 # alice\n');
    expect(addToWhitelist('# users\n', 42)).toBe('# users\n42\n');
  });

  it('adds a newline before appending when the file lacks one', () => {
    expect(addToWhitelist('1', 2)).toBe('1\n2\n');
  });

  it('leaves content alone when the ID is already listed', () => {
    const content = '42 # alice\n';
    expect(addToWhitelist(content, 42, 'someone else')).toBe(content);
  });
});

describe('removeFromWhitelist', () => {
  it('drops the matching line and keeps everything else', () => {
    expect(removeFromWhitelist('# users\n1 # a\n2 # b\n', 1)).toBe('# users\n2 # b\n');
  });

  it('is a no-op for unknown IDs', () => {
    expect(removeFromWhitelist('1\n', 99)).toBe('1\n');
  });
});

describe('WhitelistStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'gifbot-whitelist-'));
    file = path.join(dir, '.whitelist');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('denies everyone when the file is missing', () => {
    const store = new WhitelistStore(file);

    expect(store.isAllowed(1)).toBe(false);
    expect(store.size).toBe(0);
  });

  it('denies everyone when the file is empty', () => {
    writeFileSync(file, '');
    const store = new WhitelistStore(file);

    expect(store.isAllowed(1)).toBe(false);
  });

  it('allows listed users only', () => {
    writeFileSync(file, '10\n20\n');
    const store = new WhitelistStore(file);

    expect(store.isAllowed(10)).toBe(true);
    expect(store.isAllowed(20)).toBe(true);
    expect(store.isAllowed(30)).toBe(false);
    expect(store.list()).toEqual([10, 20]);
  });

  it('picks up edits when the file changes', () => {
    writeFileSync(file, '10\n');
    utimesSync(file, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'));
    const store = new WhitelistStore(file);
    expect(store.isAllowed(30)).toBe(false);

    writeFileSync(file, '10\n30\n');
    utimesSync(file, new Date('2024-01-02T00:00:00Z'), new Date('2024-01-02T00:00:00Z'));

    expect(store.isAllowed(30)).toBe(true);
  });

  it('only reloads when the modification time moves', () => {
    writeFileSync(file, '10\n');
    const store = new WhitelistStore(file);

    expect(store.refresh()).toBe(true);
    expect(store.refresh()).toBe(false);
  });

  it('exposes invalid entries', () => {
    writeFileSync(file, '10\nnot-an-id\n');
    const store = new WhitelistStore(file);
    store.refresh();

    expect(store.invalidEntries).toEqual([{ line: 2, text: 'not-an-id' }]);
  });
});

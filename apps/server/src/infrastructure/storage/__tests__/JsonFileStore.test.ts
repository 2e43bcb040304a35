/**
 * JSON file store persistence tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileStore } from '../JsonFileStore';
import { MemoryStore } from '../MemoryStore';
import { createSilentLogger } from '../../logging';

const isNumber = (value: unknown): value is number => typeof value === 'number';

describe('JsonFileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'store-test-'));
    file = path.join(dir, 'nested', 'store.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should persist writes across instances', () => {
    const first = new JsonFileStore(file, isNumber, createSilentLogger());
    first.put('a', 1);
    first.put('b', 2);
    first.delete('a');

    const second = new JsonFileStore(file, isNumber, createSilentLogger());
    expect(second.get('a')).toBeUndefined();
    expect(second.get('b')).toBe(2);
    expect(second.keys()).toEqual(['b']);
  });

  it('should keep values in memory when the file cannot be written', () => {
    fs.writeFileSync(path.join(dir, 'nested'), 'a file where a directory belongs');
    const store = new JsonFileStore(file, isNumber, createSilentLogger());

    expect(() => store.put('a', 1)).not.toThrow();
    expect(store.get('a')).toBe(1);
    expect(() => store.clear()).not.toThrow();
    expect(store.keys()).toEqual([]);
  });

  it('should drop entries the guard rejects', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ good: 5, bad: 'five' }));

    const store = new JsonFileStore(file, isNumber, createSilentLogger());

    expect(store.keys()).toEqual(['good']);
  });

  it('should start empty when the file is not JSON', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{not json');

    const store = new JsonFileStore(file, isNumber, createSilentLogger());

    expect(store.get('anything')).toBeUndefined();
    store.put('x', 3);
    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({ x: 3 });
  });

  it('should clear everything', () => {
    const store = new JsonFileStore(file, isNumber, createSilentLogger());
    store.put('x', 1);
    store.clear();

    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({});
  });
});

describe('MemoryStore', () => {
  it('should behave as a plain map', () => {
    const store = new MemoryStore<string>();
    store.put('k', 'v');
    expect(store.get('k')).toBe('v');
    store.clear();
    expect(store.keys()).toEqual([]);
  });
});

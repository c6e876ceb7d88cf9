import { mkdtempSync, readFileSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { LocalFileStorage } from '../../../src/adapters/sys/LocalFileStorage';

describe('LocalFileStorage', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'toolchat-storage-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('creates the root on first write and returns the written path', async () => {
    const storage = new LocalFileStorage(path.join(dir, 'OUTPUTS'));
    const written = await storage.write('a.txt', 'hello');
    expect(written).toBe(path.join(dir, 'OUTPUTS', 'a.txt'));
    expect(readFileSync(written, 'utf8')).toBe('hello');
  });

  test('overwrites an existing key', async () => {
    const storage = new LocalFileStorage(dir);
    await storage.write('x.txt', 'first');
    const written = await storage.write('x.txt', Buffer.from('second'));
    expect(readFileSync(written, 'utf8')).toBe('second');
  });

  test('rejects keys that leave the root', async () => {
    const storage = new LocalFileStorage(dir);
    await expect(storage.write('../escape.txt', 'x')).rejects.toThrow(/resolves outside/);
    await expect(storage.write('', 'x')).rejects.toThrow(/resolves outside/);
  });
});

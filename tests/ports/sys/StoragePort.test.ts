import type { StoragePort } from '../../../src/ports/sys/StoragePort';

describe('StoragePort contract (in-memory implementation)', () => {
  class MemoryStorage implements StoragePort {
    readonly store = new Map<string, Buffer>();
    async write(key: string, value: Buffer | string): Promise<string> {
      this.store.set(key, Buffer.isBuffer(value) ? value : Buffer.from(value));
      return `memory://${key}`;
    }
  }

  test('write stores the value and resolves with where it went', async () => {
    const s = new MemoryStorage();
    await expect(s.write('a.wav', 'hello')).resolves.toBe('memory://a.wav');
    expect(s.store.get('a.wav')?.toString()).toBe('hello');
  });
});

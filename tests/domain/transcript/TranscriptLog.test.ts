import { TranscriptLog } from '../../../src/domain/transcript/TranscriptLog';
import { formatDelay } from '../../../src/domain/transcript/Segment';

function draft(text: string, start = 0, end = 0) {
  return { text, truncated: false, captureStart: start, captureEnd: end };
}

describe('TranscriptLog', () => {
  test('assigns gap-free increasing positions and derives the processing delay', () => {
    const log = new TranscriptLog();
    const a = log.append(draft('one', 1000, 2500));
    const b = log.append(draft('two', 3000, 3100));
    const c = log.append(draft('three'));

    expect([a.position, b.position, c.position]).toEqual([0, 1, 2]);
    expect(a.processingDelay).toBe(1500);
    expect(b.processingDelay).toBe(100);
    expect(log.length).toBe(3);
    expect(log.get(1)).toBe(b);
    expect(log.get(3)).toBeUndefined();
  });

  test('appended segments are frozen', () => {
    const log = new TranscriptLog();
    const segment = log.append(draft('fixed'));
    expect(Object.isFrozen(segment)).toBe(true);
  });

  test('readFrom returns a copy starting at the given position', () => {
    const log = new TranscriptLog();
    log.append(draft('a'));
    log.append(draft('b'));
    const tail = log.readFrom(1);
    expect(tail.map((s) => s.text)).toEqual(['b']);
    log.append(draft('c'));
    expect(tail).toHaveLength(1);
    expect(log.readFrom(-5).map((s) => s.text)).toEqual(['a', 'b', 'c']);
  });
});

describe('TranscriptCursor', () => {
  test('reads pending segments and advances one position per commit', () => {
    const log = new TranscriptLog();
    const cursor = log.cursor();
    log.append(draft('a'));
    log.append(draft('b'));

    expect(cursor.backlog).toBe(2);
    const pending = cursor.pending();
    cursor.commit(pending[0]);
    expect(cursor.position).toBe(1);
    cursor.commit(pending[1]);
    expect(cursor.position).toBe(2);
    expect(cursor.pending()).toHaveLength(0);
    expect(cursor.backlog).toBe(0);
  });

  test('refuses to commit a position other than the next one', () => {
    const log = new TranscriptLog();
    const cursor = log.cursor();
    const first = log.append(draft('a'));
    const second = log.append(draft('b'));

    expect(() => cursor.commit(second)).toThrow('Cursor expected position 0 but was asked to commit 1.');
    cursor.commit(first);
    expect(() => cursor.commit(first)).toThrow('Cursor expected position 1 but was asked to commit 0.');
    expect(cursor.position).toBe(1);
  });

  test('independent cursors progress separately', () => {
    const log = new TranscriptLog();
    const fast = log.cursor();
    const slow = log.cursor();
    const segment = log.append(draft('a'));

    fast.commit(segment);
    expect(fast.position).toBe(1);
    expect(slow.position).toBe(0);
    expect(slow.backlog).toBe(1);
  });

  test('rejects invalid start positions', () => {
    const log = new TranscriptLog();
    expect(() => log.cursor(-1)).toThrow(RangeError);
    expect(() => log.cursor(1.5)).toThrow(RangeError);
  });
});

describe('formatDelay', () => {
  test('formats milliseconds as seconds with two decimals', () => {
    expect(formatDelay(1234)).toBe('1.23s');
    expect(formatDelay(0)).toBe('0.00s');
  });
});

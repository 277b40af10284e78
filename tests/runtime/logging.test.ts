import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { initializeLogging } from '../../src/runtime/logging';

describe('initializeLogging', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'livescribe-log-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('without a log file nothing is redirected', () => {
    const before = console.log;
    const handle = initializeLogging();
    expect(handle.logPath).toBeUndefined();
    expect(console.log).toBe(before);
    handle.shutdown();
  });

  test('mirrors console output into the log file until shutdown', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'log').mockImplementation(() => {});
    const logFile = path.join(dir, 'nested', 'run.log');

    const handle = initializeLogging(logFile);
    console.info('Transcribed: hello', { delayMs: 1200 });
    console.error(new Error('boom'));
    handle.shutdown();
    handle.shutdown();
    console.log('after shutdown');
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(handle.logPath).toBe(path.resolve(logFile));
    const lines = fs.readFileSync(logFile, 'utf8').trim().split('\n');
    expect(lines[0]).toMatch(/^\[.+\] --- livescribe session started ---$/);
    expect(lines[1]).toMatch(/^\[.+\] INFO Transcribed: hello \{"delayMs":1200\}$/);
    expect(lines[2]).toMatch(/^\[.+\] ERROR Error: boom$/);
    expect(lines[lines.length - 1]).toMatch(/^\[.+\] --- livescribe session ended ---$/);
    expect(lines.some((line) => line.includes('after shutdown'))).toBe(false);
  });
});

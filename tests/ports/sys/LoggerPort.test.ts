import type { LoggerPort } from '../../../src/ports/sys/LoggerPort';
import { RecordingLogger } from '../../helpers/fakes';

describe('LoggerPort contract (recording implementation)', () => {
  test('supports level methods with optional meta', () => {
    const recorder = new RecordingLogger();
    const log: LoggerPort = recorder;
    log.info('hello');
    log.error('oops', { code: 500 });

    expect(recorder.entries[0]).toMatchObject({ level: 'info', message: 'hello' });
    expect(recorder.entries[1]).toMatchObject({ level: 'error', message: 'oops', meta: { code: 500 } });
    expect(recorder.messages('error')).toEqual(['oops']);
  });
});

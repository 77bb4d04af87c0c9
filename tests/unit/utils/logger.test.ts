import { createAppLogger, jsonFormat, logger } from '../../../src/cli/utils/logger';
import { EngineErrorCode, OutOfRange } from '../../../src/shared/engine/errors';

function renderJson(info: { level: string; message: string; [key: string]: unknown }): Record<string, unknown> {
  const out = jsonFormat.transform(info);
  if (typeof out === 'boolean') {
    throw new Error('log entry was filtered out');
  }
  return JSON.parse(String(Reflect.get(out, Symbol.for('message'))));
}

describe('logger', () => {
  it('is silent under test', () => {
    expect(logger.silent).toBe(true);
    expect(createAppLogger({ level: 'debug', format: 'json' }, 'test').silent).toBe(true);
  });

  it('honours the configured level outside test', () => {
    const devLogger = createAppLogger({ level: 'warn', format: 'pretty' }, 'development');

    expect(devLogger.silent).toBe(false);
    expect(devLogger.level).toBe('warn');
    expect(devLogger.transports).toHaveLength(1);
    devLogger.close();
  });

  it('serialises engine errors with their code and context', () => {
    const error = new OutOfRange(EngineErrorCode.RANGE_SUBSTITUTION_INPUT, 'too big', { value: 300 });
    const entry = renderJson({ level: 'error', message: 'failed', error });

    expect(entry.message).toBe('failed');
    expect(entry.service).toBe('chesswalk-sbox');
    expect(entry.error).toMatchObject({
      type: 'OutOfRange',
      code: 'RANGE_SUBSTITUTION_INPUT',
      context: { value: 300 },
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('reduces plain errors to name, message and stack', () => {
    const entry = renderJson({ level: 'error', message: 'failed', error: new TypeError('bad') });

    expect(entry.error).toMatchObject({ name: 'TypeError', message: 'bad' });
  });
});

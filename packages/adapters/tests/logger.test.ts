import { describe, expect, it } from 'vitest';

import { FakeLogger, PinoLogger } from '../src/index';

describe('FakeLogger', () => {
  it('captures message-only and object-first calls', () => {
    const logger = new FakeLogger();

    logger.info('started');
    logger.warn({ subject: 'a.b' }, 'dropped');

    expect(logger.logs).toEqual([
      { level: 'info', msg: 'started', bindings: {} },
      { level: 'warn', obj: { subject: 'a.b' }, msg: 'dropped', bindings: {} },
    ]);
  });

  it('shares entries with children and merges bindings', () => {
    const root = new FakeLogger({ service: 'api' });
    const child = root.child({ component: 'bridge' });

    child.error({ err: 'boom' }, 'failed');

    expect(root.entries('error', 'failed')).toEqual([
      { level: 'error', obj: { err: 'boom' }, msg: 'failed', bindings: { service: 'api', component: 'bridge' } },
    ]);
    expect(root.entries('info')).toEqual([]);
  });
});

describe('PinoLogger', () => {
  it('creates children without throwing at silent level', () => {
    const logger = new PinoLogger({ level: 'fatal', name: 'test' });
    const child = logger.child({ component: 'x' });

    expect(() => child.info({ a: 1 }, 'ignored')).not.toThrow();
    expect(child).toBeInstanceOf(PinoLogger);
  });
});

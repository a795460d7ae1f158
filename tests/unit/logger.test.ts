describe('logger', () => {
  const loadWith = (vars: Record<string, string | undefined>) => {
    const saved = { ...process.env };
    Object.assign(process.env, vars);
    for (const [key, value] of Object.entries(vars)) {
      if (value === undefined) delete process.env[key];
    }
    try {
      let level = '';
      jest.isolateModules(() => {
        const isolated: typeof import('../../src/observability/logger') = require('../../src/observability/logger');
        level = isolated.logger.level;
      });
      return level;
    } finally {
      process.env = saved;
    }
  };

  it('should stay silent under test unless a level is set', () => {
    expect(loadWith({ NODE_ENV: 'test', LOG_LEVEL: undefined })).toBe('silent');
  });

  it('should take the level from LOG_LEVEL', () => {
    expect(loadWith({ NODE_ENV: 'test', LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('should bind turn ids on the child logger', () => {
    const { turnLogger }: typeof import('../../src/observability/logger') = require('../../src/observability/logger');
    const child = turnLogger({ turnId: 'turn-1', userId: 'user-1', sessionId: 'session-1' });
    expect(child.bindings()).toMatchObject({ turnId: 'turn-1', userId: 'user-1', sessionId: 'session-1' });
  });
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from '../../src/config/config-service';
import { RouterLimits } from '../../src/config/types';

describe('ConfigService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'router-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, body: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, body);
    return file;
  };

  it('should load the shipped router config', () => {
    const config = new ConfigService().get();
    expect(config.history).toEqual({ maxSize: 20, windowSize: 5 });
    expect(config.escalation.rules.map((r) => r.name)).toEqual([
      'multiple_unsuccessful_attempts',
      'high_priority_keywords',
      'sentiment_escalation',
      'explicit_escalation_request',
    ]);
    expect(config.intents.knowledgeEligible).toContain('product_information');
  });

  it('should use the built-in default when the file is missing', () => {
    const config = new ConfigService(path.join(dir, 'absent.json')).get();
    expect(config).toEqual(ConfigService.builtInDefault());
  });

  it('should use the built-in default when the file fails validation', () => {
    const file = write('invalid.json', JSON.stringify({ escalation: { rules: 'all of them' } }));
    expect(new ConfigService(file).get()).toEqual(ConfigService.builtInDefault());
  });

  it('should use the built-in default when the file is not JSON', () => {
    const file = write('broken.json', '{ not json');
    expect(new ConfigService(file).get()).toEqual(ConfigService.builtInDefault());
  });

  it('should take a valid file as written', () => {
    const custom = ConfigService.builtInDefault();
    custom.escalation.rules = [{ name: 'explicit_escalation_request', defaultPriority: 'critical' }];
    const file = write('custom.json', JSON.stringify({ escalation: custom.escalation, intents: custom.intents }));

    const config = new ConfigService(file).get();
    expect(config.escalation.rules).toEqual([{ name: 'explicit_escalation_request', defaultPriority: 'critical' }]);
  });

  it('should reload after the file changes', () => {
    const file = write('reload.json', JSON.stringify(ConfigService.builtInDefault()));
    const service = new ConfigService(file);

    const changed = ConfigService.builtInDefault();
    changed.escalation.negativeWords = ['dreadful'];
    fs.writeFileSync(file, JSON.stringify(changed));
    service.load();

    expect(service.get().escalation.negativeWords).toEqual(['dreadful']);
  });

  describe('limits', () => {
    const limits: RouterLimits = { maxHistorySize: 4, windowSize: 3, maxUnsuccessfulAttempts: 2 };

    it('should apply limits over the shipped tables', () => {
      const config = new ConfigService(undefined, limits).get();
      expect(config.history).toEqual({ maxSize: 4, windowSize: 3 });
      expect(config.escalation.maxUnsuccessfulAttempts).toBe(2);
      expect(config.escalation.rules).toHaveLength(4);
    });

    it('should ignore limit keys left in a config file', () => {
      const file = write(
        'with-limits.json',
        JSON.stringify({ ...ConfigService.builtInDefault(limits), history: { maxSize: 50, windowSize: 9 } }),
      );
      expect(new ConfigService(file, limits).get().history).toEqual({ maxSize: 4, windowSize: 3 });
    });

    it('should keep limits when falling back to the built-in default', () => {
      const config = new ConfigService(path.join(dir, 'absent.json'), limits).get();
      expect(config.history).toEqual({ maxSize: 4, windowSize: 3 });
      expect(config.escalation.maxUnsuccessfulAttempts).toBe(2);
    });

    it('should read limits from the environment', () => {
      const saved = { ...process.env };
      process.env.MAX_HISTORY_SIZE = '4';
      process.env.HISTORY_WINDOW_SIZE = '3';
      process.env.MAX_UNSUCCESSFUL_ATTEMPTS = '2';
      try {
        jest.isolateModules(() => {
          const isolated: typeof import('../../src/config/config-service') = require('../../src/config/config-service');
          const config = isolated.configService.get();
          expect(config.history).toEqual({ maxSize: 4, windowSize: 3 });
          expect(config.escalation.maxUnsuccessfulAttempts).toBe(2);
        });
      } finally {
        process.env = saved;
      }
    });
  });
});

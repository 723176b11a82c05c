import { describe, it, expect } from 'vitest';
import { createValidatedConfig, detectEnvironment, loadConfig, parseLogLevel } from '../../src/config/app-config.js';
import type { AppConfig, EnvironmentName, TimeoutMs } from '../../src/config/app-config.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'empty env');
    expect(config.logging.level).toBe('silent');
    expect(config.environment).toBe('production');
    expect(config.probes.urlTimeoutMs).toBe(5000);
  });

  it('reads every setting', () => {
    const config = expectOk(
      loadConfig({
        env: {
          CONFIGKIT_LOG_LEVEL: ' DEBUG ',
          CONFIGKIT_ENVIRONMENT: 'staging',
          CONFIGKIT_URL_TIMEOUT_MS: '2500',
        },
      }),
      'full env'
    );
    expect(config.logging.level).toBe('debug');
    expect(config.environment).toBe('staging');
    expect(config.probes.urlTimeoutMs).toBe(2500);
  });

  it('prefers CONFIGKIT_ENVIRONMENT over NODE_ENV', () => {
    const config = expectOk(loadConfig({ env: { CONFIGKIT_ENVIRONMENT: 'qa', NODE_ENV: 'development' } }), 'env');
    expect(config.environment).toBe('qa');
  });

  it('falls back to NODE_ENV, ignoring a blank override', () => {
    const config = expectOk(loadConfig({ env: { CONFIGKIT_ENVIRONMENT: '  ', NODE_ENV: 'development' } }), 'env');
    expect(config.environment).toBe('development');
  });

  it('rejects an unknown log level', () => {
    const error = expectErr(loadConfig({ env: { CONFIGKIT_LOG_LEVEL: 'loud' } }), 'bad level');
    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues.map((i) => i.path)).toEqual(['CONFIGKIT_LOG_LEVEL']);
  });

  it.each(['0', '-5', '1.5', 'soon', '300001'])('rejects URL timeout %s', (value) => {
    const error = expectErr(loadConfig({ env: { CONFIGKIT_URL_TIMEOUT_MS: value } }), 'bad timeout');
    expect(error.issues.map((i) => i.path)).toEqual(['CONFIGKIT_URL_TIMEOUT_MS']);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(expectOk(loadConfig({ env: {} }), 'frozen'))).toBe(true);
  });
});

describe('createValidatedConfig', () => {
  it('brands a config without parsing', () => {
    const value: AppConfig = {
      logging: { level: 'info' },
      environment: 'test' as EnvironmentName,
      probes: { urlTimeoutMs: 100 as TimeoutMs },
    };
    const config = createValidatedConfig(value);
    expect(config.environment).toBe('test');
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('detectEnvironment', () => {
  it('uses the same precedence as loadConfig', () => {
    expect(detectEnvironment({ CONFIGKIT_ENVIRONMENT: 'Staging', NODE_ENV: 'test' })).toBe('Staging');
    expect(detectEnvironment({ NODE_ENV: 'test' })).toBe('test');
    expect(detectEnvironment({})).toBe('production');
  });
});

describe('parseLogLevel', () => {
  it('is lenient', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('nonsense')).toBe('silent');
    expect(parseLogLevel(undefined)).toBe('silent');
  });
});

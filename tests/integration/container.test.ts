/**
 * Integration Tests: TSyringe DI Container
 *
 * Verifies the composition root wires config, logging and startup validation.
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { container } from 'tsyringe';
import { DI } from '../../src/di/tokens.js';
import { initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import type { ValidatedConfig } from '../../src/config/app-config.js';
import type { ProcessTerminator } from '../../src/runtime/ports/process-terminator.js';
import { ThrowingProcessTerminator } from '../../src/runtime/adapters/throwing-process-terminator.js';
import { StartupValidator } from '../../src/startup/startup-validator.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { setupTest } from '../di/test-container.js';

describe('TSyringe DI Container', () => {
  beforeEach(() => {
    resetContainer();
  });

  afterEach(() => {
    resetContainer();
  });

  it('initializes container successfully', async () => {
    await initializeContainer({ runtimeMode: { kind: 'test' }, env: {} });

    expect(isInitialized()).toBe(true);
    expect(() => container.resolve(DI.Logging.Factory)).not.toThrow();
    expect(container.resolve(DI.Validation.Startup)).toBeInstanceOf(StartupValidator);
  });

  it('parses the library config from the given environment', async () => {
    await initializeContainer({
      runtimeMode: { kind: 'test' },
      env: { CONFIGKIT_ENVIRONMENT: 'staging', CONFIGKIT_URL_TIMEOUT_MS: '750' },
    });

    const config = container.resolve<ValidatedConfig>(DI.Config.App);
    expect(config.environment).toBe('staging');
    expect(config.probes.urlTimeoutMs).toBe(750);
  });

  it('uses a throwing terminator in test mode', async () => {
    await initializeContainer({ runtimeMode: { kind: 'test' }, env: {} });

    expect(container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator)).toBeInstanceOf(
      ThrowingProcessTerminator
    );
  });

  it('fails initialization on invalid library config', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      initializeContainer({ runtimeMode: { kind: 'test' }, env: { CONFIGKIT_URL_TIMEOUT_MS: '-1' } })
    ).rejects.toThrow('[DI] Container initialization failed: [ProcessTerminator] terminate(failure)');
    expect(stderr.mock.calls[0]?.[0]).toBe(
      'Invalid configkit environment settings\n\n  - CONFIGKIT_URL_TIMEOUT_MS: CONFIGKIT_URL_TIMEOUT_MS must be positive'
    );
  });

  it('resolves the startup validator as a singleton', async () => {
    await initializeContainer({ runtimeMode: { kind: 'test' }, env: {} });

    const first = container.resolve(DI.Validation.Startup);
    const second = container.resolve(DI.Validation.Startup);
    expect(first).toBe(second);
  });

  it('shares concurrent initialization', async () => {
    await Promise.all([
      initializeContainer({ runtimeMode: { kind: 'test' }, env: {} }),
      initializeContainer({ runtimeMode: { kind: 'test' }, env: {} }),
    ]);
    expect(isInitialized()).toBe(true);
  });

  it('keeps test-provided config and logger factory', async () => {
    const loggerFactory = new FakeLoggerFactory();
    await setupTest({ loggerFactory });

    const validator = container.resolve<StartupValidator>(DI.Validation.Startup);
    validator.addSection('App', () => ({ name: 'orders-api' })).notEmpty('name');
    expect((await validator.run()).isOk()).toBe(true);

    expect(container.resolve<ValidatedConfig>(DI.Config.App).environment).toBe('test');
    expect(loggerFactory.getLogger('StartupValidator')?.hasEntry('info', 'Configuration validated')).toBe(true);
  });
});

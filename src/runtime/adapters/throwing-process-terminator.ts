import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so a failed startup check
 * surfaces as a test failure rather than killing the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}

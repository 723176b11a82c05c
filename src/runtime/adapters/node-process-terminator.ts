import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'success':
        return process.exit(0);
      case 'failure':
        return process.exit(1);
      default:
        return assertNever(code);
    }
  }
}

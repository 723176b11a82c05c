import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import type { FileSystemProbePort, PathKind } from '../../ports/file-system-probe.port.js';
import { isBlank, readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

type EntryKind = Extract<PathKind, 'file' | 'directory'>;

/**
 * Blank path → "not specified"; nothing of the expected kind at the path →
 * "does not exist". Probe failures (permissions, I/O) fail with the probe's message.
 */
abstract class PathExistsRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  protected constructor(
    key: K,
    customMessage: string | undefined,
    private readonly probe: FileSystemProbePort,
    private readonly kind: EntryKind
  ) {
    super(key, customMessage);
  }

  async validate(options: T, sectionName: string): Promise<ConfigValidationError | null> {
    const path = readText(this.accessor.get(options));

    if (path === null || isBlank(path)) {
      return this.fail(sectionName, `${this.propertyName} ${this.kind} path is not specified`, path, [
        `Specify a valid ${this.kind} path`,
      ]);
    }

    return this.probe.pathKind(path).match<ConfigValidationError | null>(
      (found) =>
        found === this.kind
          ? null
          : this.fail(sectionName, `${this.label()} does not exist: ${path}`, path, [
              `Create ${this.kind} at: ${path}`,
            ]),
      (error) =>
        this.fail(sectionName, error.message, path, [`Check that the ${this.kind} at ${path} is readable`])
    );
  }

  private label(): string {
    return this.kind === 'file' ? 'File' : 'Directory';
  }
}

export class FileExistsRule<T, K extends StringKey<T>> extends PathExistsRule<T, K> {
  constructor(key: K, probe: FileSystemProbePort, customMessage?: string) {
    super(key, customMessage, probe, 'file');
  }
}

export class DirectoryExistsRule<T, K extends StringKey<T>> extends PathExistsRule<T, K> {
  constructor(key: K, probe: FileSystemProbePort, customMessage?: string) {
    super(key, customMessage, probe, 'directory');
  }
}

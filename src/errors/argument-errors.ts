/**
 * Construction-time misuse. These are programmer errors raised while rules
 * are being declared; they never surface from `validate`.
 */
export class ConfigKitArgumentError extends Error {
  readonly _tag: 'ConfigKitArgument' | 'InvalidSelector' = 'ConfigKitArgument';

  constructor(
    readonly argument: string,
    message: string
  ) {
    super(`${argument}: ${message}`);
    this.name = 'ConfigKitArgumentError';
  }
}

/** A selector did not name a single top-level property. */
export class InvalidSelectorError extends ConfigKitArgumentError {
  override readonly _tag = 'InvalidSelector';

  constructor(
    readonly selector: string,
    reason: string
  ) {
    super('selector', `${JSON.stringify(selector)} is not a valid property selector (${reason})`);
    this.name = 'InvalidSelectorError';
  }
}

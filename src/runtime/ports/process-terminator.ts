/**
 * Port for terminating the current process.
 * Only composition roots and the startup validator may hold one.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

/**
 * Runtime mode of the current process.
 * Decided once in the composition root and injected; services never sniff env vars for it.
 */
export type RuntimeMode =
  | { readonly kind: 'production' }
  | { readonly kind: 'test' };

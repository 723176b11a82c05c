/**
 * Brand helper: a branded value proves it passed through a parser.
 *
 * String-keyed marker (not a `unique symbol`) so branded types can be
 * named in exported zod transforms without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

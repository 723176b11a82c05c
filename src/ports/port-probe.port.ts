import type { ResultAsync } from 'neverthrow';

export type PortProbeError =
  | { readonly code: 'PORT_IN_USE'; readonly message: string }
  | { readonly code: 'PORT_BIND_FAILED'; readonly message: string };

/**
 * Port: can a loopback listener bind `port` right now?
 *
 * Best-effort only: the port is released before the answer is returned, so
 * another process may take it before the host application binds it.
 */
export interface PortProbePort {
  tryBind(port: number): ResultAsync<void, PortProbeError>;
}

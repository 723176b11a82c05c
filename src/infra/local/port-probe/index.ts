import * as net from 'net';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { PortProbePort, PortProbeError } from '../../../ports/port-probe.port.js';
import { errorMessage, nodeErrorCode } from '../node-error-code.js';

const LOOPBACK = '127.0.0.1';

/**
 * Binds a throwaway listener on the loopback interface and closes it again.
 * The server is closed on every path: after a successful listen, and (as a
 * no-op) after a failed one.
 */
export class NodePortProbe implements PortProbePort {
  tryBind(port: number): ResultAsync<void, PortProbeError> {
    return RA.fromPromise(bindAndRelease(port), (e) => mapBindError(e, port));
  }
}

function bindAndRelease(port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const server = net.createServer();

    server.once('error', (error) => {
      server.close();
      reject(error);
    });

    server.once('listening', () => {
      server.close((closeError) => {
        if (closeError) reject(closeError);
        else resolve();
      });
    });

    server.listen({ port, host: LOOPBACK, exclusive: true });
  });
}

function mapBindError(e: unknown, port: number): PortProbeError {
  if (nodeErrorCode(e) === 'EADDRINUSE') {
    return { code: 'PORT_IN_USE', message: `Port ${port} is already in use` };
  }
  return { code: 'PORT_BIND_FAILED', message: `Port ${port} cannot be bound: ${errorMessage(e)}` };
}

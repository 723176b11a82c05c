import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import type { PortProbePort } from '../../ports/port-probe.port.js';
import { formatValue } from '../../utils/format-value.js';
import type { KeysMatching } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

const MIN_PORT = 1;
const MAX_PORT = 65_535;

export type PortKey<T> = KeysMatching<T, number | null | undefined>;

/**
 * Checks the port is in range, then that a loopback listener can bind it.
 *
 * This is a point-in-time check: the port is released again immediately, so
 * it can still be taken before the host binds it. Treat a pass as best-effort.
 */
export class PortAvailableRule<T, K extends PortKey<T>> extends PropertyRule<T, K> {
  constructor(
    key: K,
    private readonly probe: PortProbePort,
    customMessage?: string
  ) {
    super(key, customMessage);
  }

  async validate(options: T, sectionName: string): Promise<ConfigValidationError | null> {
    const port = this.accessor.get(options);

    if (typeof port !== 'number' || !Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
      return this.failWithMessage(
        sectionName,
        `Port number must be between ${MIN_PORT} and ${MAX_PORT} (current: ${formatValue(port)})`,
        port,
        ['Use a valid port number']
      );
    }

    return this.probe.tryBind(port).match<ConfigValidationError | null>(
      () => null,
      (error) =>
        this.fail(sectionName, error.code === 'PORT_IN_USE' ? `Port ${port} is already in use` : error.message, port, [
          'Choose a different port or stop the service using this port',
        ])
    );
  }
}

import { Result } from 'neverthrow';
import type { ConfigValidationError } from '../../errors/config-validation-error.js';
import type { HttpProbePort } from '../../ports/http-probe.port.js';
import { isBlank, readText, type StringKey } from '../property-accessor.js';
import { PropertyRule } from './property-rule.js';

const CONNECTIVITY_HINT = 'Check URL availability and network connectivity';

const parseAbsoluteUrl = Result.fromThrowable(
  (raw: string) => new URL(raw),
  () => 'invalid-url' as const
);

/**
 * Performs a real GET against the configured URL. A non-2xx status and a
 * transport failure are reported with different messages but the same hint.
 */
export class UrlReachableRule<T, K extends StringKey<T>> extends PropertyRule<T, K> {
  constructor(
    key: K,
    private readonly probe: HttpProbePort,
    private readonly timeoutMs: number,
    customMessage?: string
  ) {
    super(key, customMessage);
  }

  async validate(options: T, sectionName: string): Promise<ConfigValidationError | null> {
    const url = readText(this.accessor.get(options));

    if (url === null || isBlank(url)) {
      return this.fail(sectionName, `${this.propertyName} URL is not specified`, url, ['Specify a valid URL']);
    }

    const parsed = parseAbsoluteUrl(url);
    if (parsed.isErr()) {
      return this.failWithMessage(sectionName, `Invalid URL format: ${url}`, url, [
        'Use format: http://example.com or https://example.com',
      ]);
    }

    return this.probe.get(parsed.value, this.timeoutMs).match<ConfigValidationError | null>(
      (response) =>
        response.ok ? null : this.fail(sectionName, `URL returned ${response.status}: ${url}`, url, [CONNECTIVITY_HINT]),
      (error) => this.fail(sectionName, `Failed to reach URL: ${error.message}`, url, [CONNECTIVITY_HINT])
    );
  }
}

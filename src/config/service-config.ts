import { MeasurementKindName } from '../common/measurement.types';

/**
 * Injection token for the immutable startup configuration.
 */
export const SERVICE_CONFIG = Symbol('SERVICE_CONFIG');

/**
 * Startup configuration derived from the process arguments.
 *
 * Threaded through the container explicitly so nothing downstream reads
 * `process.argv`.
 */
export interface ServiceConfig {
  readonly enabledKinds: readonly MeasurementKindName[];
  /** Drop and recreate the measurement tables before serving */
  readonly resetSchema: boolean;
}

/**
 * Normalize kind tokens (trim, lower-case, split on commas, de-duplicate
 * keeping first occurrence) and freeze the result.
 */
export function createServiceConfig(
  kinds: readonly string[],
  options: { resetSchema?: boolean } = {},
): ServiceConfig {
  const enabledKinds: string[] = [];
  for (const token of kinds.flatMap((k) => k.split(','))) {
    const kind = token.trim().toLowerCase();
    if (kind && !enabledKinds.includes(kind)) {
      enabledKinds.push(kind);
    }
  }

  return Object.freeze({
    enabledKinds: Object.freeze(enabledKinds),
    resetSchema: options.resetSchema ?? false,
  });
}

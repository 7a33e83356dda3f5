import { MeasurementKindName } from './measurement.types';

/**
 * Base class for every failure the measurement core reports.
 *
 * `code` is stable and ends up in HTTP error bodies; `details` carries the
 * structured context a client needs to correct the request.
 */
export abstract class MeasurementError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A kind token that no registered validator handles.
 * Raised at startup when an unsupported kind is enabled.
 */
export class UnknownKindError extends MeasurementError {
  readonly code = 'UNKNOWN_KIND';

  constructor(
    public readonly kind: MeasurementKindName,
    supported: readonly MeasurementKindName[] = [],
  ) {
    super(
      supported.length > 0
        ? `Unknown measurement kind '${kind}'. Supported kinds: ${supported.join(', ')}`
        : `Unknown measurement kind '${kind}'`,
      { kind, supported },
    );
  }
}

export class KindNotEnabledError extends MeasurementError {
  readonly code = 'KIND_NOT_ENABLED';

  constructor(
    public readonly kind: MeasurementKindName,
    enabled: readonly MeasurementKindName[] = [],
  ) {
    super(`Measurement kind '${kind}' is not enabled`, { kind, enabled });
  }
}

export class MalformedPayloadError extends MeasurementError {
  readonly code = 'MALFORMED_PAYLOAD';

  constructor(public readonly problems: string[]) {
    super(`Malformed payload: ${problems.join('; ')}`, { problems });
  }
}

export interface RangeBound {
  side: 'min' | 'max';
  limit: number;
}

export class OutOfRangeError extends MeasurementError {
  readonly code = 'OUT_OF_RANGE';

  constructor(
    public readonly kind: MeasurementKindName,
    public readonly value: number,
    public readonly bound: RangeBound,
    /** Location within a batch body, e.g. `values[3]` */
    public readonly path?: string,
  ) {
    super(
      `${path ? `${path}: ` : ''}Value ${value} for '${kind}' is ${bound.side === 'min' ? 'below the minimum' : 'above the maximum'} of ${bound.limit}`,
      path ? { kind, value, bound, path } : { kind, value, bound },
    );
  }
}

export class InvalidRangeError extends MeasurementError {
  readonly code = 'INVALID_RANGE';

  constructor(
    public readonly from: Date,
    public readonly to: Date,
  ) {
    super(
      `'from' (${from.toISOString()}) must not be after 'to' (${to.toISOString()})`,
      { from: from.toISOString(), to: to.toISOString() },
    );
  }
}

/**
 * The storage backend could not complete an operation. Nothing was written.
 * Transient from the client's point of view: retrying is safe.
 */
export class StorageUnavailableError extends MeasurementError {
  readonly code = 'STORAGE_UNAVAILABLE';

  constructor(operation: string, cause?: unknown) {
    super(
      `Storage unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation },
      { cause },
    );
  }
}

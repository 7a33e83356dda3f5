import { OutOfRangeError } from '../../common/measurement.errors';
import { MeasurementValidator } from '../interfaces/measurement-validator.interface';

export interface RangeValidatorOptions {
  kind: string;
  unit: string;
  description: string;
  min?: number;
  max?: number;
}

const KIND_TOKEN = /^[a-z][a-z0-9_]{0,31}$/;

/**
 * Validator for quantities bounded by an inclusive [min, max] interval.
 *
 * Normalization folds negative zero into zero so `-0` never reaches storage.
 * The kind token doubles as a partition-name suffix, hence the restricted
 * alphabet.
 */
export class RangeValidator implements MeasurementValidator {
  readonly kind: string;
  readonly unit: string;
  readonly description: string;
  readonly min?: number;
  readonly max?: number;

  constructor(options: RangeValidatorOptions) {
    if (!KIND_TOKEN.test(options.kind)) {
      throw new Error(`Invalid measurement kind token: '${options.kind}'`);
    }
    if (
      options.min !== undefined &&
      options.max !== undefined &&
      options.min > options.max
    ) {
      throw new Error(
        `Invalid range for '${options.kind}': min ${options.min} > max ${options.max}`,
      );
    }

    this.kind = options.kind;
    this.unit = options.unit;
    this.description = options.description;
    this.min = options.min;
    this.max = options.max;
  }

  validate(value: number): number {
    if (this.min !== undefined && value < this.min) {
      throw new OutOfRangeError(this.kind, value, {
        side: 'min',
        limit: this.min,
      });
    }
    if (this.max !== undefined && value > this.max) {
      throw new OutOfRangeError(this.kind, value, {
        side: 'max',
        limit: this.max,
      });
    }
    return value === 0 ? 0 : value;
  }
}

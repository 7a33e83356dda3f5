import { MeasurementKindName } from '../../common/measurement.types';

/**
 * MeasurementValidator - one strategy per measurement kind.
 *
 * Each physical quantity (power, flow, temperature, ...) implements this
 * contract to check and normalize the numeric value of a reading. New kinds
 * are added by registering another validator; the ingestion and query paths
 * dispatch through the registry and never branch on a kind name.
 */
export interface MeasurementValidator {
  /** Kind token this validator handles, e.g. 'flow' */
  readonly kind: MeasurementKindName;

  /** Unit stored values are expressed in, e.g. 'm3/h' */
  readonly unit: string;

  readonly description: string;

  /** Inclusive lower bound, if any */
  readonly min?: number;

  /** Inclusive upper bound, if any */
  readonly max?: number;

  /**
   * Check the value against the kind's accepted range and return its
   * normalized form.
   *
   * @throws OutOfRangeError carrying the violated bound
   */
  validate(value: number): number;
}

/**
 * Public description of a registered kind.
 */
export interface MeasurementKindDescriptor {
  kind: MeasurementKindName;
  unit: string;
  description: string;
  min: number | null;
  max: number | null;
  enabled: boolean;
}

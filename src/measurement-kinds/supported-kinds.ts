import { MeasurementValidator } from './interfaces/measurement-validator.interface';
import { RangeValidator } from './validators/range.validator';

/**
 * The fixed set of kinds this service knows how to validate.
 * Which of them are active is decided at startup.
 */
export function createSupportedValidators(): MeasurementValidator[] {
  return [
    new RangeValidator({
      kind: 'power',
      unit: 'W',
      description: 'Active power',
      min: 0,
      max: 1e9,
    }),
    new RangeValidator({
      kind: 'flow',
      unit: 'm3/h',
      description: 'Volumetric flow rate',
      min: 0,
      max: 1e6,
    }),
    new RangeValidator({
      kind: 'temperature',
      unit: 'degC',
      description: 'Temperature',
      min: -273.15,
      max: 2000,
    }),
    new RangeValidator({
      kind: 'pressure',
      unit: 'kPa',
      description: 'Absolute pressure',
      min: 0,
      max: 1e6,
    }),
    new RangeValidator({
      kind: 'humidity',
      unit: '%RH',
      description: 'Relative humidity',
      min: 0,
      max: 100,
    }),
  ];
}

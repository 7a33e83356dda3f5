// Re-export public API
export { MeasurementKindsModule } from './measurement-kinds.module';
export { MeasurementKindRegistry } from './measurement-kind.registry';
export { RangeValidator } from './validators/range.validator';
export { createSupportedValidators } from './supported-kinds';
export type {
  MeasurementValidator,
  MeasurementKindDescriptor,
} from './interfaces/measurement-validator.interface';

import { Logger } from '@nestjs/common';
import { MeasurementKindName } from '../common/measurement.types';
import { UnknownKindError } from '../common/measurement.errors';
import { ServiceConfig } from '../config/service-config';
import {
  MeasurementKindDescriptor,
  MeasurementValidator,
} from './interfaces/measurement-validator.interface';
import { createSupportedValidators } from './supported-kinds';

/**
 * MeasurementKindRegistry
 *
 * Maps kind tokens to their validators and knows which kinds were enabled
 * for this process. Populated once at startup; read-only afterwards.
 */
export class MeasurementKindRegistry {
  private readonly logger = new Logger(MeasurementKindRegistry.name);
  private readonly validators = new Map<MeasurementKindName, MeasurementValidator>();
  private readonly enabled: ReadonlySet<MeasurementKindName>;

  constructor(config: ServiceConfig) {
    this.enabled = new Set(config.enabledKinds);
  }

  /**
   * Build a registry holding every supported validator and verify that each
   * enabled kind resolves.
   *
   * @throws UnknownKindError for the first enabled kind nobody handles
   */
  static fromConfig(
    config: ServiceConfig,
    validators: MeasurementValidator[] = createSupportedValidators(),
  ): MeasurementKindRegistry {
    const registry = new MeasurementKindRegistry(config);
    for (const validator of validators) {
      registry.register(validator.kind, validator);
    }
    for (const kind of config.enabledKinds) {
      registry.resolve(kind);
    }

    registry.logger.log(
      `Enabled measurement kinds: ${config.enabledKinds.join(', ')}`,
    );
    return registry;
  }

  register(kind: MeasurementKindName, validator: MeasurementValidator): void {
    if (this.validators.has(kind)) {
      throw new Error(`Measurement kind '${kind}' is already registered`);
    }
    this.validators.set(kind, validator);
    this.logger.debug(`Registered kind '${kind}' (${validator.unit})`);
  }

  isEnabled(kind: MeasurementKindName): boolean {
    return this.enabled.has(kind) && this.validators.has(kind);
  }

  resolve(kind: MeasurementKindName): MeasurementValidator {
    const validator = this.validators.get(kind);
    if (!validator) {
      throw new UnknownKindError(kind, this.supportedKinds());
    }
    return validator;
  }

  supportedKinds(): MeasurementKindName[] {
    return [...this.validators.keys()];
  }

  enabledKinds(): MeasurementKindName[] {
    return this.supportedKinds().filter((kind) => this.isEnabled(kind));
  }

  describe(): MeasurementKindDescriptor[] {
    return [...this.validators.values()].map((v) => ({
      kind: v.kind,
      unit: v.unit,
      description: v.description,
      min: v.min ?? null,
      max: v.max ?? null,
      enabled: this.isEnabled(v.kind),
    }));
  }
}

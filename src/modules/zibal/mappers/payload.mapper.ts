import { ClassConstructor, ClassTransformOptions, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { DeserializationException } from '@/common/exceptions';

const TRANSFORM_OPTIONS: ClassTransformOptions = {
  excludeExtraneousValues: true,
  exposeDefaultValues: true,
  exposeUnsetFields: false,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const formatValidationErrors = (errors: ValidationError[], parent = ''): string[] =>
  errors.flatMap((error) => {
    const prefix = parent ? `${parent}.` : '';
    const own = Object.values(error.constraints ?? {}).map((message) => `${prefix}${message}`);
    const path = `${prefix}${error.property}`;
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });

/** Turns gateway JSON into validated DTO instances. */
export class ZibalPayloadMapper {
  static fromBody<T extends object>(cls: ClassConstructor<T>, body: string): T {
    if (body.trim() === '') {
      throw new DeserializationException(`Empty body, expected ${cls.name}`);
    }

    let plain: unknown;
    try {
      plain = JSON.parse(body);
    } catch (error) {
      throw new DeserializationException(`Body is not valid JSON, expected ${cls.name}`, [], {
        cause: error,
      });
    }

    return this.fromPlain(cls, plain);
  }

  static fromPlain<T extends object>(cls: ClassConstructor<T>, plain: unknown): T {
    if (!isRecord(plain)) {
      throw new DeserializationException(`Expected a JSON object for ${cls.name}`);
    }

    const instance = plainToInstance(cls, plain, TRANSFORM_OPTIONS);
    const errors = validateSync(instance);
    if (errors.length > 0) {
      throw new DeserializationException(
        `Invalid ${cls.name}: ${formatValidationErrors(errors).join('; ')}`,
        errors,
      );
    }

    return instance;
  }
}

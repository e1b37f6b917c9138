import { ArgumentMetadata, Injectable, PipeTransform, Type } from '@nestjs/common';
import { validate, ValidationError as ClassValidatorError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { FieldErrors, ValidationError } from '../errors/domain.errors';

/**
 * Flattens class-validator output into `{ field: 'message, message' }`.
 * Nested properties use dotted paths.
 */
export function toFieldErrors(errors: ClassValidatorError[], parent?: string): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const error of errors) {
    const field = parent ? `${parent}.${error.property}` : error.property;
    if (error.constraints) {
      fieldErrors[field] = Object.values(error.constraints).join(', ');
    }
    if (error.children && error.children.length > 0) {
      Object.assign(fieldErrors, toFieldErrors(error.children, field));
    }
  }
  return fieldErrors;
}

/**
 * Global validation pipe for request bodies, query strings and route params
 *
 * Transforms plain input into the DTO class and validates it with
 * class-validator. Unknown properties are rejected. Any failure becomes one
 * ValidationError listing every offending field.
 */
@Injectable()
export class ValidationPipe implements PipeTransform<unknown> {
  async transform(value: unknown, { metatype }: ArgumentMetadata): Promise<unknown> {
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    const object: object = plainToInstance(metatype, value ?? {});
    const errors = await validate(object, { whitelist: true, forbidNonWhitelisted: true });

    if (errors.length > 0) {
      throw new ValidationError(toFieldErrors(errors));
    }

    return object;
  }

  /**
   * Built-in types carry no validation metadata
   */
  private toValidate(metatype: Type<unknown>): boolean {
    const types: Type<unknown>[] = [String, Boolean, Number, Array, Object];
    return !types.includes(metatype);
  }
}

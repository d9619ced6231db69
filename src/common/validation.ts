import {
  BadRequestException,
  ValidationPipe,
  type ValidationError,
} from '@nestjs/common';

export type FieldErrors = Record<string, string[]>;

/** Flatten class-validator errors into `{ "field.path": [messages] }`. */
export function toFieldErrors(
  errors: ValidationError[],
  parentPath = '',
): FieldErrors {
  const result: FieldErrors = {};
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      result[path] = Object.values(error.constraints);
    }
    if (error.children?.length) {
      Object.assign(result, toFieldErrors(error.children, path));
    }
  }
  return result;
}

/** 400 with field-keyed messages plus a machine-readable code. */
export function fieldError(
  fields: FieldErrors,
  code = 'VALIDATION_ERROR',
): BadRequestException {
  return new BadRequestException({ ...fields, code });
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) => fieldError(toFieldErrors(errors)),
  });
}

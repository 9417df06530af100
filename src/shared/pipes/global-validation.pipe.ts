import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common'

export interface FieldError {
  field: string
  constraints: string[]
}

const flatten = (errors: ValidationError[], parent?: string): FieldError[] =>
  errors.flatMap((error) => {
    const field = parent ? `${parent}.${error.property}` : error.property
    const own = error.constraints
      ? [{ field, constraints: Object.values(error.constraints) }]
      : []
    return [...own, ...flatten(error.children ?? [], field)]
  })

/**
 * Global Validation Pipe
 *
 * Validates and transforms DTOs with class-validator. Unknown properties are
 * rejected. Failures answer 400 with `{ message, errors: [{ field, constraints }] }`.
 */
export class GlobalValidationPipe extends ValidationPipe {
  constructor() {
    super({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors) =>
        new BadRequestException({
          message: 'Validation failed',
          errors: flatten(errors),
        }),
    })
  }
}

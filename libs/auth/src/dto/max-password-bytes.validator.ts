import { registerDecorator } from 'class-validator';
import type { ValidationArguments, ValidationOptions } from 'class-validator';
import { fitsPasswordLimit, PASSWORD_MAX_BYTES } from './credential.constraints';

/**
 * Rejects strings longer than bcrypt's 72-byte input window.
 * Non-strings pass through; pair it with `@IsString()`.
 */
export function MaxPasswordBytes(validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string): void => {
    registerDecorator({
      name: 'maxPasswordBytes',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown): boolean {
          return typeof value !== 'string' || fitsPasswordLimit(value);
        },
        defaultMessage(args: ValidationArguments): string {
          return `${args.property} must be at most ${PASSWORD_MAX_BYTES} bytes long`;
        },
      },
    });
  };
}

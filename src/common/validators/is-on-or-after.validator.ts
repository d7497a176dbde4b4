import {
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
  registerDecorator,
} from 'class-validator';
import { isCalendarDate } from './calendar-date';

/**
 * Compares two YYYY-MM-DD fields of the same object.
 * Skipped when either side is not a valid date; IsCalendarDate reports that.
 */
@ValidatorConstraint({ name: 'isOnOrAfter', async: false })
export class IsOnOrAfterConstraint implements ValidatorConstraintInterface {
  validate(value: unknown, args: ValidationArguments): boolean {
    const relatedProperty: unknown = args.constraints[0];
    if (typeof relatedProperty !== 'string') return false;

    const related: unknown = Reflect.get(args.object, relatedProperty);
    if (!isCalendarDate(value) || !isCalendarDate(related)) return true;
    return value >= related;
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must not be before ${String(args.constraints[0])}`;
  }
}

export function IsOnOrAfter(property: string, validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string) => {
    registerDecorator({
      target: object.constructor,
      propertyName,
      options: validationOptions,
      constraints: [property],
      validator: IsOnOrAfterConstraint,
    });
  };
}

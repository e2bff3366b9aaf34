import {
  registerDecorator,
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { isCalendarDate } from '../utils/calendar-date.util';

const MIN_YEAR = 2000;
const MAX_YEAR = 2100;

/**
 * Shape and calendar check only (YYYY-MM-DD, real day of month, year
 * 2000-2100). The window relative to today needs the clock and is checked
 * by the service.
 */
@ValidatorConstraint({ name: 'isCalendarDate', async: false })
export class IsCalendarDateConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === 'string' && isCalendarDate(value, MIN_YEAR, MAX_YEAR);
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a valid calendar date (YYYY-MM-DD)`;
  }
}

export function IsCalendarDate(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      target: object.constructor,
      propertyName: propertyName,
      options: validationOptions,
      constraints: [],
      validator: IsCalendarDateConstraint,
    });
  };
}

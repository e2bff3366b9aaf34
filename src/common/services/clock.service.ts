import { Injectable } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

/**
 * Source of "now" for overdue and due-date window checks.
 * `today()` is always a UTC calendar date formatted YYYY-MM-DD.
 */
export interface Clock {
  now(): Date;
  today(): string;
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  today(): string {
    return formatCalendarDate(this.now());
  }
}

/**
 * Clock pinned to a single calendar day. Timestamps it hands out are
 * midnight UTC of that day.
 */
export class FixedClock implements Clock {
  constructor(private readonly date: string) {}

  now(): Date {
    return new Date(`${this.date}T00:00:00.000Z`);
  }

  today(): string {
    return this.date;
  }
}

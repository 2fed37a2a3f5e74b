import { Injectable } from '@nestjs/common';

import { toIsoDate } from './dates';

/** Source of "now" for services; replaced with a fixed clock in tests. */
export abstract class Clock {
  abstract now(): Date;

  today(): string {
    return toIsoDate(this.now());
  }

  timestamp(): string {
    return this.now().toISOString();
  }
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}

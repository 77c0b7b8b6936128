import { Injectable } from '@nestjs/common';
import { IClock } from '@application/adaptors/clock.interface';

@Injectable()
export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }
}

import { Injectable } from '@nestjs/common';
import type { Clock } from '@/domain/services';

@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

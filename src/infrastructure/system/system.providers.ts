import { Provider } from '@nestjs/common';
import { CLOCK, ID_GENERATOR } from '@/domain/services';
import { SystemClock } from './system.clock';
import { UuidIdGenerator } from './uuid-id.generator';

/**
 * Providers for the id generator and clock ports.
 * Tests override these tokens with deterministic fixtures.
 */
export const systemProviders: Provider[] = [
  {
    provide: ID_GENERATOR,
    useClass: UuidIdGenerator,
  },
  {
    provide: CLOCK,
    useClass: SystemClock,
  },
];

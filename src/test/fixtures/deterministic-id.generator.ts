import type { IdGenerator } from '@/domain/services';

/** Generates `${prefix}-1`, `${prefix}-2`, ... for predictable assertions. */
export class DeterministicIdGenerator implements IdGenerator {
  private counter = 0;

  constructor(private readonly prefix: string = 'test-id') {}

  generate(): string {
    this.counter++;
    return `${this.prefix}-${this.counter}`;
  }
}

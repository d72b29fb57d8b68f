import { Inject, Injectable } from '@nestjs/common';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { HealthResponseDto, HealthStatus } from '@/application/dtos';

/** Timeout in milliseconds for the store probe */
const STORE_TIMEOUT_MS = 3000;

/**
 * Health check service for liveness probes.
 * Reports unhealthy when the airline store cannot be read in time.
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  async check(): Promise<HealthResponseDto> {
    return { status: await this.checkStore() };
  }

  private async checkStore(): Promise<HealthStatus> {
    try {
      await this.withTimeout(this.airlineRepository.count(), STORE_TIMEOUT_MS);
      return 'healthy';
    } catch (error) {
      this.logger.error('Airline store check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return 'unhealthy';
    }
  }

  /** Rejects with `Timeout` when the probe takes longer than `ms`. */
  private async withTimeout<T>(probe: Promise<T>, ms: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), ms);
    });

    try {
      return await Promise.race([probe, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

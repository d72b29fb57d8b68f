export { HealthService } from './health.service';

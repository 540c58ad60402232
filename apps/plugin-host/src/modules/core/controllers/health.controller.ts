import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { HealthService, type HealthReadiness, type HealthStatus } from '../services/health.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  check(): HealthStatus {
    return this.healthService.getStatus();
  }

  @Get('ready')
  @ApiOperation({ summary: 'Readiness check endpoint' })
  @ApiResponse({ status: 200, description: 'Service is ready' })
  @ApiResponse({ status: 503, description: 'A readiness check failed' })
  async ready(): Promise<HealthReadiness> {
    const readiness = await this.healthService.getReadiness();
    if (!readiness.ready) {
      const failing = Object.entries(readiness.checks)
        .filter(([, status]) => status === 'fail')
        .map(([name]) => name);
      throw new ServiceUnavailableException(
        failing.length > 0 ? `Not ready: ${failing.join(', ')}` : 'Not ready: no readiness checks',
      );
    }
    return readiness;
  }
}

import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckError,
  HealthCheckService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CheckHealthUseCase } from '../../application/use-cases/check-health.use-case';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly checkHealthUseCase: CheckHealthUseCase,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Database reachability' })
  @ApiResponse({ status: 200, description: 'Database reachable' })
  @ApiResponse({ status: 503, description: 'Database unreachable' })
  check() {
    return this.health.check([
      async (): Promise<HealthIndicatorResult> => {
        const status = await this.checkHealthUseCase.execute();
        const result: HealthIndicatorResult = {
          database: { status: status.database ? 'up' : 'down' },
        };
        if (!status.database) {
          throw new HealthCheckError('Database unreachable', result);
        }
        return result;
      },
    ]);
  }
}

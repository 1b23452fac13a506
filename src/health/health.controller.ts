import { Controller, Get } from '@nestjs/common';

import { CredentialPoolService } from '../credentials/credential-pool.service';
import type { PoolHealthSummary } from '../credentials/types';

@Controller('health')
export class HealthController {
  constructor(private readonly credentialPool: CredentialPoolService) {}

  @Get()
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  // Counts only; credential values never leave through this route.
  @Get('pool')
  getPoolHealth(): PoolHealthSummary {
    return this.credentialPool.summary();
  }
}

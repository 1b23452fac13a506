import { Module } from '@nestjs/common';

import { CredentialsModule } from '../credentials/credentials.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CredentialsModule],
  controllers: [HealthController],
})
export class HealthModule {}

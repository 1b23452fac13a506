import { Module } from '@nestjs/common';

import { CredentialsModule } from '../credentials/credentials.module';
import { HttpClientModule } from '../http-client/http-client.module';
import { ProxyController } from './proxy.controller';
import { ProxyService } from './proxy.service';

@Module({
  imports: [CredentialsModule, HttpClientModule],
  controllers: [ProxyController],
  providers: [ProxyService],
})
export class ProxyModule {}

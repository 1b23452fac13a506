import { Module } from '@nestjs/common';

import { PersistenceModule } from '../persistence/persistence.module';
import { SessionsModule } from '../sessions/sessions.module';
import { CredentialPoolService } from './credential-pool.service';
import { KeysController } from './keys.controller';

@Module({
  imports: [PersistenceModule, SessionsModule],
  controllers: [KeysController],
  providers: [CredentialPoolService],
  exports: [CredentialPoolService],
})
export class CredentialsModule {}

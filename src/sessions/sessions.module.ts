import { Module } from '@nestjs/common';

import { PersistenceModule } from '../persistence/persistence.module';
import { SessionAuthGuard } from './session-auth.guard';
import { SessionsService } from './sessions.service';
import { UsersController } from './users.controller';

@Module({
  imports: [PersistenceModule],
  controllers: [UsersController],
  providers: [SessionsService, SessionAuthGuard],
  exports: [SessionsService, SessionAuthGuard],
})
export class SessionsModule {}

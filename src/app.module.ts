import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { envValidationSchema } from './config/env.validation';
import { CredentialsModule } from './credentials/credentials.module';
import { HealthModule } from './health/health.module';
import { HttpClientModule } from './http-client/http-client.module';
import { PersistenceModule } from './persistence/persistence.module';
import { ProxyModule } from './proxy/proxy.module';
import { SessionsModule } from './sessions/sessions.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
    PersistenceModule,
    SessionsModule,
    CredentialsModule,
    HttpClientModule,
    HealthModule,
    ProxyModule,
  ],
})
export class AppModule {}

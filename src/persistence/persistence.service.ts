import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DurableCollection, PersistenceLoadError } from './durable-collection';
import { credentialRecordSchema, sessionRecordSchema, userRecordSchema } from './record-schemas';
import { CredentialRecord, SessionRecord, UserRecord } from './types';

@Injectable()
export class PersistenceService implements OnModuleInit {
  private readonly logger = new Logger(PersistenceService.name);
  private readonly dataDir: string;
  readonly users: DurableCollection<UserRecord>;
  readonly sessions: DurableCollection<SessionRecord>;
  readonly credentials: DurableCollection<CredentialRecord>;

  constructor(private readonly configService: ConfigService) {
    const configured = this.configService.get<string>('DATA_DIR');
    this.dataDir = resolve(configured && configured.trim().length > 0 ? configured : './data');

    this.users = new DurableCollection<UserRecord>({
      name: 'users',
      filePath: join(this.dataDir, 'users.json'),
      keyOf: (record) => record.username,
      schema: userRecordSchema,
    });
    this.sessions = new DurableCollection<SessionRecord>({
      name: 'sessions',
      filePath: join(this.dataDir, 'sessions.json'),
      keyOf: (record) => record.tokenHash,
      schema: sessionRecordSchema,
    });
    this.credentials = new DurableCollection<CredentialRecord>({
      name: 'credentials',
      filePath: join(this.dataDir, 'credentials.json'),
      keyOf: (record) => record.value,
      schema: credentialRecordSchema,
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      await mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      throw new PersistenceLoadError(`Unable to create data directory ${this.dataDir}`, {
        cause: error,
      });
    }

    await this.users.load();
    await this.sessions.load();
    await this.credentials.load();

    this.logger.log(
      `State loaded from ${this.dataDir}: ${this.users.size} user(s), ${this.sessions.size} session(s), ${this.credentials.size} credential(s)`,
    );
  }
}

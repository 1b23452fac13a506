import { randomBytes, randomUUID } from 'node:crypto';

import { ConflictException, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import bcrypt from 'bcrypt';

import { ErrorCode } from '../common/error-codes';
import { readIntegerSetting } from '../config/settings';
import { PersistenceService } from '../persistence/persistence.service';
import { SessionRecord, UserRecord } from '../persistence/types';
import { hashForLogging, sha256Hex } from '../utils/hash';
import { SerialLock } from '../utils/serial-lock';
import { IssuedSession, SessionPrincipal } from './types';

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);
  private readonly lock = new SerialLock();
  private readonly sessionTtlSeconds: number;
  private readonly passwordHashRounds: number;

  constructor(
    private readonly persistence: PersistenceService,
    private readonly configService: ConfigService,
  ) {
    this.sessionTtlSeconds = readIntegerSetting(
      this.configService,
      this.logger,
      'SESSION_TTL_SECONDS',
      86400,
      { min: 0 },
    );
    this.passwordHashRounds = readIntegerSetting(
      this.configService,
      this.logger,
      'PASSWORD_HASH_ROUNDS',
      10,
      { min: 4, max: 15 },
    );
  }

  async register(username: string, password: string): Promise<string> {
    // Hash outside the lock; it is the slow part.
    const passwordHash = await bcrypt.hash(password, this.passwordHashRounds);

    return this.lock.runExclusive(async () => {
      if (this.persistence.users.has(username)) {
        throw new ConflictException('Username is already registered', {
          description: ErrorCode.DuplicateUser,
        });
      }

      const record: UserRecord = {
        userId: randomUUID(),
        username,
        passwordHash,
        createdAt: new Date().toISOString(),
      };
      await this.persistence.users.put(record);
      this.logger.log(`Registered user ${record.userId}`);

      return record.userId;
    });
  }

  async login(username: string, password: string): Promise<IssuedSession> {
    const user = this.persistence.users.get(username);
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw new UnauthorizedException('Invalid username or password', {
        description: ErrorCode.InvalidCredentials,
      });
    }

    return this.lock.runExclusive(async () => {
      let token = this.generateToken();
      // Hash collisions of 256-bit tokens are not expected; the loop keeps the invariant anyway.
      while (this.persistence.sessions.has(sha256Hex(token))) {
        token = this.generateToken();
      }

      const record: SessionRecord = {
        tokenHash: sha256Hex(token),
        userId: user.userId,
        issuedAt: new Date().toISOString(),
        revoked: false,
      };
      await this.persistence.sessions.put(record);
      this.logger.log(`Issued session ${hashForLogging(token)} for user ${user.userId}`);

      return { token, userId: user.userId };
    });
  }

  verify(token: string | null | undefined): SessionPrincipal {
    const session = this.findValidSession(token);
    if (!session) {
      throw this.unauthorized();
    }

    return { userId: session.userId };
  }

  /**
   * Revoke the presented token. Unknown, revoked and expired tokens are all rejected the
   * same way so the response does not reveal which of them it was.
   */
  async logout(token: string | null | undefined): Promise<void> {
    await this.lock.runExclusive(async () => {
      const session = this.findValidSession(token);
      if (!session) {
        throw this.unauthorized();
      }

      await this.persistence.sessions.put({
        ...session,
        revoked: true,
        revokedAt: new Date().toISOString(),
      });
      this.logger.log(`Revoked session for user ${session.userId}`);
    });
  }

  private findValidSession(token: string | null | undefined): SessionRecord | null {
    if (!token || token.trim().length === 0) {
      return null;
    }

    const session = this.persistence.sessions.get(sha256Hex(token));
    if (!session || session.revoked || this.isExpired(session.issuedAt)) {
      return null;
    }

    return session;
  }

  private isExpired(issuedAt: string): boolean {
    if (this.sessionTtlSeconds === 0) {
      return false;
    }

    const parsed = Date.parse(issuedAt);
    if (Number.isNaN(parsed)) {
      return true;
    }

    return Date.now() >= parsed + this.sessionTtlSeconds * 1000;
  }

  private generateToken(): string {
    return randomBytes(32).toString('base64url');
  }

  private unauthorized(): UnauthorizedException {
    return new UnauthorizedException('Invalid or expired session token', {
      description: ErrorCode.Unauthorized,
    });
  }
}

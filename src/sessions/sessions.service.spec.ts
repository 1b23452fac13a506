import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigService } from '@nestjs/config';

import { PersistenceService } from '../persistence/persistence.service';
import { expectHttpError } from '../testing/http-error';
import { SessionsService } from './sessions.service';

describe('SessionsService', () => {
  let dataDir: string;

  const buildServices = async (overrides: Record<string, unknown> = {}) => {
    const values: Record<string, unknown> = {
      DATA_DIR: dataDir,
      PASSWORD_HASH_ROUNDS: 4,
      SESSION_TTL_SECONDS: 3600,
      ...overrides,
    };
    const configService = { get: (key: string) => values[key] } as unknown as ConfigService;
    const persistence = new PersistenceService(configService);
    await persistence.onModuleInit();
    return { persistence, sessions: new SessionsService(persistence, configService) };
  };

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'sessions-service-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('registers a user and rejects the same username twice', async () => {
    const { sessions } = await buildServices();

    const userId = await sessions.register('alice', 'pw');

    expect(userId).toMatch(/^[0-9a-f-]{36}$/);
    await expectHttpError(sessions.register('alice', 'other-pw'), 409, 'DuplicateUser');
  });

  it('never stores the plaintext password', async () => {
    const { persistence, sessions } = await buildServices();

    await sessions.register('alice', 'plain-password-value');

    const stored = await readFile(join(dataDir, 'users.json'), 'utf-8');
    expect(stored).not.toContain('plain-password-value');
    expect(persistence.users.get('alice')?.passwordHash).toMatch(/^\$2[aby]\$04\$/);
  });

  it('logs in with the right password and verifies the issued token', async () => {
    const { sessions } = await buildServices();
    const userId = await sessions.register('alice', 'pw');

    const issued = await sessions.login('alice', 'pw');

    expect(issued.userId).toBe(userId);
    expect(issued.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(sessions.verify(issued.token)).toEqual({ userId });
  });

  it('rejects unknown users and wrong passwords alike', async () => {
    const { sessions } = await buildServices();
    await sessions.register('alice', 'pw');

    await expectHttpError(sessions.login('alice', 'wrong'), 401, 'InvalidCredentials');
    await expectHttpError(sessions.login('nobody', 'pw'), 401, 'InvalidCredentials');
  });

  it('rejects unknown and empty tokens', async () => {
    const { sessions } = await buildServices();

    await expectHttpError(() => sessions.verify('not-a-token'), 401, 'Unauthorized');
    await expectHttpError(() => sessions.verify(''), 401, 'Unauthorized');
    await expectHttpError(() => sessions.verify(null), 401, 'Unauthorized');
  });

  it('revokes only the presented token and refuses to revoke it twice', async () => {
    const { sessions } = await buildServices();
    const userId = await sessions.register('alice', 'pw');
    const first = await sessions.login('alice', 'pw');
    const second = await sessions.login('alice', 'pw');

    await sessions.logout(first.token);

    await expectHttpError(() => sessions.verify(first.token), 401, 'Unauthorized');
    expect(sessions.verify(second.token)).toEqual({ userId });
    await expectHttpError(sessions.logout(first.token), 401, 'Unauthorized');
    await expectHttpError(sessions.logout('never-issued'), 401, 'Unauthorized');
  });

  it('issues a different token on every login', async () => {
    const { sessions } = await buildServices();
    await sessions.register('alice', 'pw');

    const tokens = new Set<string>();
    for (let index = 0; index < 5; index += 1) {
      tokens.add((await sessions.login('alice', 'pw')).token);
    }

    expect(tokens.size).toBe(5);
  });

  it('expires sessions after the configured window', async () => {
    const { sessions } = await buildServices({ SESSION_TTL_SECONDS: 60 });
    await sessions.register('alice', 'pw');
    const { token } = await sessions.login('alice', 'pw');
    const issuedAt = Date.now();

    jest.spyOn(Date, 'now').mockReturnValue(issuedAt + 61_000);

    await expectHttpError(() => sessions.verify(token), 401, 'Unauthorized');
    await expectHttpError(sessions.logout(token), 401, 'Unauthorized');
  });

  it('keeps sessions valid forever when the window is 0', async () => {
    const { sessions } = await buildServices({ SESSION_TTL_SECONDS: 0 });
    const userId = await sessions.register('alice', 'pw');
    const { token } = await sessions.login('alice', 'pw');

    jest.spyOn(Date, 'now').mockReturnValue(Date.now() + 365 * 24 * 3600 * 1000);

    expect(sessions.verify(token)).toEqual({ userId });
  });

  it('reloads users and session state after a restart', async () => {
    const before = await buildServices();
    const userId = await before.sessions.register('alice', 'pw');
    const kept = await before.sessions.login('alice', 'pw');
    const revoked = await before.sessions.login('alice', 'pw');
    await before.sessions.logout(revoked.token);

    const after = await buildServices();

    expect(after.sessions.verify(kept.token)).toEqual({ userId });
    await expectHttpError(() => after.sessions.verify(revoked.token), 401, 'Unauthorized');
    await expect(after.sessions.login('alice', 'pw')).resolves.toMatchObject({ userId });
    await expectHttpError(after.sessions.register('alice', 'pw'), 409, 'DuplicateUser');
  });
});

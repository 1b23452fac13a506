import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';

import { validateBody } from '../common/validate-body';
import { requirePrincipal, SessionAuthGuard } from '../sessions/session-auth.guard';
import { AuthenticatedRequest } from '../sessions/types';
import { hashForLogging } from '../utils/hash';
import { CredentialPoolService } from './credential-pool.service';
import { addKeyBodySchema, importKeysBodySchema, removeKeyBodySchema } from './credentials.schemas';
import { CredentialStatusView, ImportResult } from './types';

type KeyAuditAction = 'add' | 'import' | 'remove' | 'list' | 'status';

@Controller('keys')
@UseGuards(SessionAuthGuard)
export class KeysController {
  private readonly logger = new Logger(KeysController.name);

  constructor(private readonly credentialPool: CredentialPoolService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async add(
    @Req() request: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<{ credentialId: string }> {
    const { userId } = requirePrincipal(request);
    const { value, endpoint } = validateBody(addKeyBodySchema, body);

    try {
      const credentialId = await this.credentialPool.add(userId, value, endpoint);
      this.audit(request, 'add', 'ok', { key: hashForLogging(value) });
      return { credentialId };
    } catch (error) {
      this.audit(request, 'add', 'error', {
        key: hashForLogging(value),
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Post('import')
  @HttpCode(HttpStatus.OK)
  async importKeys(
    @Req() request: AuthenticatedRequest,
    @Body() body: unknown,
  ): Promise<ImportResult> {
    const { userId } = requirePrincipal(request);
    const { values, endpoint } = validateBody(importKeysBodySchema, body);

    try {
      const result = await this.credentialPool.addMany(userId, values, endpoint);
      this.audit(request, 'import', 'ok', { ...result });
      return result;
    } catch (error) {
      this.audit(request, 'import', 'error', {
        count: values.length,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Req() request: AuthenticatedRequest, @Body() body: unknown): Promise<void> {
    const { userId } = requirePrincipal(request);
    const { value } = validateBody(removeKeyBodySchema, body);

    try {
      await this.credentialPool.remove(userId, value);
      this.audit(request, 'remove', 'ok', { key: hashForLogging(value) });
    } catch (error) {
      this.audit(request, 'remove', 'error', {
        key: hashForLogging(value),
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Get()
  list(@Req() request: AuthenticatedRequest): { keys: string[] } {
    const { userId } = requirePrincipal(request);
    const keys = this.credentialPool.list(userId);
    this.audit(request, 'list', 'ok', { count: keys.length });
    return { keys };
  }

  @Get('status')
  status(@Req() request: AuthenticatedRequest): { items: CredentialStatusView[] } {
    const { userId } = requirePrincipal(request);
    const items = this.credentialPool.listStatus(userId);
    this.audit(request, 'status', 'ok', { count: items.length });
    return { items };
  }

  private audit(
    request: AuthenticatedRequest,
    action: KeyAuditAction,
    result: 'ok' | 'error',
    details?: Record<string, unknown>,
  ): void {
    const requestIdHeader = request.headers['x-request-id'];
    const requestId = Array.isArray(requestIdHeader) ? requestIdHeader[0] : requestIdHeader;
    const payload = {
      event: 'credential_audit',
      action,
      result,
      userId: request.principal?.userId ?? 'unknown',
      ip: request.ip ?? 'unknown',
      requestId: requestId ?? null,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }

  private errorReason(error: unknown): string {
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}

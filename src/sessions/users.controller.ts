import { Body, Controller, HttpCode, HttpStatus, Post, Req, UseGuards } from '@nestjs/common';

import { validateBody } from '../common/validate-body';
import { requirePrincipal, SessionAuthGuard } from './session-auth.guard';
import { accountBodySchema } from './sessions.schemas';
import { SessionsService } from './sessions.service';
import { AuthenticatedRequest, IssuedSession } from './types';

@Controller('users')
export class UsersController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() body: unknown): Promise<{ userId: string }> {
    const { username, password } = validateBody(accountBodySchema, body);
    const userId = await this.sessionsService.register(username, password);
    return { userId };
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() body: unknown): Promise<IssuedSession> {
    const { username, password } = validateBody(accountBodySchema, body);
    return this.sessionsService.login(username, password);
  }

  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  @UseGuards(SessionAuthGuard)
  async logout(@Req() request: AuthenticatedRequest): Promise<void> {
    const { token } = requirePrincipal(request);
    await this.sessionsService.logout(token);
  }
}

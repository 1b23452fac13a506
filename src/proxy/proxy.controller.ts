import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';

import { validateBody } from '../common/validate-body';
import { chatCompletionBodySchema, ChatCompletionResult } from './chat-completion';
import { ProxyService } from './proxy.service';

// Public on purpose: requests are served from the shared pool, not a caller's own key.
@Controller('chat')
export class ProxyController {
  constructor(private readonly proxyService: ProxyService) {}

  @Post('completions')
  @HttpCode(HttpStatus.OK)
  async completions(@Body() body: unknown): Promise<ChatCompletionResult> {
    const request = validateBody(chatCompletionBodySchema, body);
    return this.proxyService.inference(request);
  }
}

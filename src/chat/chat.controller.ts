// src/chat/chat.controller.ts
import { randomUUID } from 'crypto';
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { TimeoutError, withTimeout } from '../shared/lib/timeout';
import { nowSeconds } from '../shared/types';
import { ChatService } from './chat.service';
import { SourceReference } from './chat.types';
import { ChatRequestDto } from './dto/chat-request.dto';
import { RequestState, RequestStatusRegistry } from './request-status.registry';

export const PROCESSING_MESSAGE =
  'Your request is still being processed. Check the status endpoint for the result.';

export interface ChatResponse {
  response: string;
  session_id: string;
  timestamp: number;
  status: RequestState;
  sources?: SourceReference[];
}

export interface StatusResponse {
  status: RequestState | 'not_found';
  response?: string;
  error?: string;
  timestamp: number;
}

@Controller()
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private readonly chatService: ChatService,
    private readonly registry: RequestStatusRegistry,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  @Post('chat')
  @HttpCode(200)
  async chat(@Body() dto: ChatRequestDto): Promise<ChatResponse> {
    const sessionId = dto.session_id ?? randomUUID();
    this.logger.log(`POST /chat session=${sessionId} wait=${dto.wait ?? true}`);

    const result = this.chatService.submit({
      message: dto.message.trim(),
      sessionId,
      role: dto.role,
      history: dto.history?.map((message) => ({ role: message.role, content: message.content })),
    });

    if (dto.wait === false) {
      return this.processing(sessionId);
    }

    try {
      const done = await withTimeout(result, this.config.chat.timeoutMs, 'chat');
      return {
        response: done.response,
        session_id: sessionId,
        timestamp: nowSeconds(),
        status: done.status,
        ...(done.sources.length ? { sources: done.sources } : {}),
      };
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      this.logger.warn(`session=${sessionId}: ${err.message}, answering with processing`);
      return this.processing(sessionId);
    }
  }

  @Get('status/:sessionId')
  status(@Param('sessionId') sessionId: string): StatusResponse {
    const status = this.registry.get(sessionId);
    if (!status) {
      return { status: 'not_found', timestamp: nowSeconds() };
    }
    return status;
  }

  private processing(sessionId: string): ChatResponse {
    return {
      response: PROCESSING_MESSAGE,
      session_id: sessionId,
      timestamp: nowSeconds(),
      status: 'processing',
    };
  }
}

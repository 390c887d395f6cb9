// src/chat/sessions.controller.ts
import { Controller, Delete, Get, Inject, Logger, Param } from '@nestjs/common';
import { ChatMessage } from '../ai/ai.types';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { SESSION_STORE, SessionStore } from '../sessions/session.store';
import { nowSeconds } from '../shared/types';
import { RequestStatusRegistry } from './request-status.registry';

@Controller('sessions')
export class SessionsController {
  private readonly logger = new Logger(SessionsController.name);

  constructor(
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
    private readonly registry: RequestStatusRegistry,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  @Get()
  async list() {
    const active = await this.sessions.listActive(this.config.sessions.activityWindowMs);
    return {
      sessions: active.map((session) => ({
        session_id: session.id,
        message_count: session.messageCount,
        last_activity: nowSeconds(session.lastActivity),
      })),
    };
  }

  @Get(':sessionId/history')
  async history(
    @Param('sessionId') sessionId: string,
  ): Promise<{ session_id: string; history: ChatMessage[] }> {
    return { session_id: sessionId, history: await this.sessions.get(sessionId) };
  }

  @Delete(':sessionId')
  async remove(@Param('sessionId') sessionId: string) {
    const existed = await this.sessions.clear(sessionId);
    this.registry.clear(sessionId);
    this.logger.log(`DELETE /sessions/${sessionId} existed=${existed}`);

    return {
      message: existed ? `Session ${sessionId} cleared` : `Session ${sessionId} not found`,
      session_id: sessionId,
      existed,
    };
  }
}

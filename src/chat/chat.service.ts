// src/chat/chat.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage, errorStack } from '../shared/errors';
import { TaskPool } from '../shared/lib/task-pool';
import { ChatRequest, SourceReference } from './chat.types';
import { LegalAssistantService } from './legal-assistant.service';
import { GENERIC_FAILURE_MESSAGE } from './prompts';
import { RequestStatusRegistry } from './request-status.registry';

export const CHAT_TASK_POOL = 'CHAT_TASK_POOL';

export const REQUEST_FAILED_ERROR = 'Request processing failed';

export interface ChatResult {
  status: 'completed' | 'failed';
  response: string;
  sources: SourceReference[];
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly assistant: LegalAssistantService,
    private readonly registry: RequestStatusRegistry,
    @Inject(CHAT_TASK_POOL) private readonly pool: TaskPool,
  ) {}

  /**
   * Queues a chat turn on the worker pool and registers it as `processing`.
   * The returned promise never rejects; its result is also written to the
   * status registry unless a newer request for the session replaced it.
   */
  submit(request: ChatRequest): Promise<ChatResult> {
    const ticket = this.registry.start(request.sessionId);
    this.logger.debug(
      `submit(): session=${request.sessionId} active=${this.pool.activeCount} pending=${this.pool.pendingCount}`,
    );

    return this.pool.run(() => this.assistant.handle(request, ticket.signal)).then(
      (outcome): ChatResult => {
        if (outcome.failed) {
          ticket.fail(REQUEST_FAILED_ERROR, outcome.response);
          return { status: 'failed', response: outcome.response, sources: [] };
        }
        ticket.complete(outcome.response);
        return { status: 'completed', response: outcome.response, sources: outcome.sources };
      },
      (err: unknown): ChatResult => {
        this.logger.error(
          `chat task failed session=${request.sessionId}: ${errorMessage(err)}`,
          errorStack(err),
        );
        ticket.fail(REQUEST_FAILED_ERROR, GENERIC_FAILURE_MESSAGE);
        return { status: 'failed', response: GENERIC_FAILURE_MESSAGE, sources: [] };
      },
    );
  }
}

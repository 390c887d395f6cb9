// src/chat/chat.module.ts
import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { OnlineSearchModule } from '../online-search/online-search.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { SessionsModule } from '../sessions/sessions.module';
import { TaskPool } from '../shared/lib/task-pool';
import { LoggingModule } from '../shared/lib/logging/logging.module';
import { SummarizationModule } from '../summarization/summarization.module';
import { ChatController } from './chat.controller';
import { CHAT_TASK_POOL, ChatService } from './chat.service';
import { IntentClassifierService } from './intent-classifier.service';
import { LegalAssistantService } from './legal-assistant.service';
import { RequestStatusRegistry } from './request-status.registry';
import { SessionsController } from './sessions.controller';

@Module({
  imports: [
    AiModule,
    RetrievalModule,
    OnlineSearchModule,
    SummarizationModule,
    SessionsModule,
    LoggingModule,
  ],
  controllers: [ChatController, SessionsController],
  providers: [
    IntentClassifierService,
    LegalAssistantService,
    ChatService,
    {
      provide: RequestStatusRegistry,
      inject: [assistantConfig.KEY],
      useFactory: (config: AssistantConfig) =>
        new RequestStatusRegistry({
          terminalStatusTtlMs: config.chat.terminalStatusTtlMs,
          staleProcessingMs: config.chat.staleProcessingMs,
          sweepIntervalMs: config.chat.sweepIntervalMs,
        }),
    },
    {
      provide: CHAT_TASK_POOL,
      inject: [assistantConfig.KEY],
      useFactory: (config: AssistantConfig) => new TaskPool(config.chat.workerPoolSize),
    },
  ],
})
export class ChatModule {}

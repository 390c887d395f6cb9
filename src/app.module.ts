// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { ChatModule } from './chat/chat.module';
import { assistantConfig } from './config/assistant.config';
import { IngestionModule } from './ingestion/ingestion.module';
import { RetrievalModule } from './retrieval/retrieval.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [assistantConfig] }),
    RetrievalModule,
    ChatModule,
    IngestionModule,
  ],
  controllers: [AppController],
})
export class AppModule {}

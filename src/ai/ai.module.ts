// src/ai/ai.module.ts
import { Logger, Module } from '@nestjs/common';
import { OpenAI } from 'openai';
import { AiService } from './ai.service';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';

@Module({
  providers: [
    {
      provide: OpenAI,
      inject: [assistantConfig.KEY],
      useFactory: (config: AssistantConfig) => {
        if (!config.openai.apiKey) {
          // The app still starts; AiService refuses calls until a key is set.
          new Logger('AiModule').warn(
            'OPENAI_API_KEY is not set. Chat and summarization will return fallback answers.',
          );
        }

        return new OpenAI({
          // the SDK throws on a missing key at construction time
          apiKey: config.openai.apiKey || 'not-configured',
          maxRetries: 2,
        });
      },
    },
    AiService,
  ],
  exports: [AiService],
})
export class AiModule {}

// src/app.controller.ts
import { Controller, Get, Inject, Logger } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from './config/assistant.config';
import { RetrievalService } from './retrieval/retrieval.service';
import { errorMessage } from './shared/errors';
import { withTimeout } from './shared/lib/timeout';
import { nowSeconds } from './shared/types';

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
}

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(
    private readonly retrieval: RetrievalService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  /** Healthy when the vector backend answers within the short timeout. */
  @Get('health')
  async health(): Promise<HealthResponse> {
    try {
      await withTimeout(this.retrieval.ping(), this.config.chat.statusTimeoutMs, 'health check');
      return { status: 'healthy', timestamp: nowSeconds() };
    } catch (err) {
      this.logger.warn(`health check failed: ${errorMessage(err)}`);
      return { status: 'unhealthy', timestamp: nowSeconds() };
    }
  }
}

// src/ai/ai.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { SynthesisError, errorMessage, errorStack } from '../shared/errors';
import { ChatMessage, CompletionOptions } from './ai.types';

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    private readonly openai: OpenAI,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  get model(): string {
    return this.config.openai.model;
  }

  /**
   * Single chat completion. Every failure (missing key, transport, timeout,
   * empty choice) surfaces as a SynthesisError.
   */
  async complete(messages: ChatMessage[], opts: CompletionOptions = {}): Promise<string> {
    const kind = opts.kind ?? 'complete';

    if (!this.config.openai.apiKey) {
      this.logger.warn(`OPENAI_API_KEY is not set. Refusing ${kind}().`);
      throw new SynthesisError('LLM is not configured');
    }

    let content: string | null | undefined;
    try {
      const res = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(toOpenAiMessage),
          temperature: opts.temperature ?? 0.2,
          response_format: opts.json ? { type: 'json_object' } : undefined,
        },
        {
          timeout: this.config.openai.timeoutMs,
          signal: opts.signal,
        },
      );

      // 🔢 metering
      if (res.usage) {
        this.logger.debug(
          `${kind}: model=${this.model} prompt=${res.usage.prompt_tokens} completion=${res.usage.completion_tokens} total=${res.usage.total_tokens}`,
        );
      }

      content = res.choices?.[0]?.message?.content;
    } catch (error) {
      this.logger.error(
        `Error while calling OpenAI (${kind}): ${errorMessage(error)}`,
        errorStack(error),
      );
      throw new SynthesisError(`LLM call failed (${kind})`, { cause: error });
    }

    const answer = content?.trim();
    if (!answer) {
      this.logger.warn(`${kind}: empty content from model`);
      throw new SynthesisError(`LLM returned no content (${kind})`);
    }

    return answer;
  }
}

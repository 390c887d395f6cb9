// src/summarization/summarization.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { ContentFetcherService, isHttpUrl } from '../extraction/content-fetcher.service';
import { truncate } from '../extraction/text';
import { errorMessage } from '../shared/errors';
import { mapWithConcurrency } from '../shared/lib/task-pool';
import { SummaryContentType, SummaryResult } from './summarization.types';

export const SUMMARY_FAILED_MESSAGE = 'Summarization failed';

@Injectable()
export class SummarizationService {
  private readonly logger = new Logger(SummarizationService.name);

  constructor(
    private readonly ai: AiService,
    private readonly fetcher: ContentFetcherService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  /** URL inputs are fetched first; anything else is summarized as text. */
  async summarize(input: string): Promise<SummaryResult> {
    const trimmed = input.trim();
    return isHttpUrl(trimmed) ? this.summarizeUrl(trimmed) : this.summarizeText(trimmed);
  }

  async summarizeUrl(url: string): Promise<SummaryResult> {
    const fetched = await this.fetcher.fetchContent(url);
    if (!fetched.ok) {
      return { ok: false, url, error: fetched.error };
    }
    return this.summarizeText(fetched.text, url, fetched.contentType);
  }

  async summarizeText(
    text: string,
    url: string | null = null,
    contentType: SummaryContentType = 'TEXT',
  ): Promise<SummaryResult> {
    const body = truncate(text.trim(), this.config.fetch.maxSourceChars);
    if (!body) {
      return { ok: false, url, error: 'Nothing to summarize' };
    }

    try {
      const [summary, context] = await Promise.all([
        this.ai.complete([{ role: 'user', content: this.summaryPrompt(body) }], {
          kind: 'summarize',
          temperature: 0.3,
        }),
        this.ai.complete(
          [
            {
              role: 'user',
              content: this.contextPrompt(body.slice(0, this.config.summarization.contextChars)),
            },
          ],
          { kind: 'extractContext', temperature: 0.1 },
        ),
      ]);

      return { ok: true, url, summary, context, contentType };
    } catch (err) {
      this.logger.error(`summarize failed url=${url ?? '-'}: ${errorMessage(err)}`);
      return { ok: false, url, error: SUMMARY_FAILED_MESSAGE };
    }
  }

  /**
   * Summarizes several URLs with bounded concurrency. Results keep the input
   * order and a failing URL only fails its own entry.
   */
  async summarizeMany(
    urls: string[],
    concurrency: number = this.config.summarization.concurrency,
  ): Promise<SummaryResult[]> {
    return mapWithConcurrency(urls, concurrency, async (url): Promise<SummaryResult> => {
      try {
        return await this.summarizeUrl(url);
      } catch (err) {
        return { ok: false, url, error: errorMessage(err) };
      }
    });
  }

  // ---------------------------------------------------------------------------
  // prompts
  // ---------------------------------------------------------------------------

  private summaryPrompt(text: string): string {
    return `
Please provide a clear and empathetic summary of this legal document. The summary should help someone seeking legal information who may be under stress.

Focus on:
1. Main legal principles and their practical implications
2. Key points that help someone understand their rights
3. Important dates, courts and judges involved
4. The human aspects of the case and its impact
5. Any protective measures or rights discussed
6. The official case citation, if available

Keep the summary relevant to common situations, balanced and objective, and supportive in tone.

Content to summarize:
${text}
`.trim();
  }

  private contextPrompt(text: string): string {
    return `
Based on the legal document, identify:
1. Court Level: Supreme Court / High Court / Other
2. Key Legal Principles: main legal concepts discussed
3. Relevance: how this might apply to similar cases
4. Important Considerations: key factors that influenced the decision

Document:
${text}
`.trim();
  }
}

// src/chat/legal-assistant.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { ChatMessage, CompletionOptions } from '../ai/ai.types';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { OnlineSearchService } from '../online-search/online-search.service';
import { SearchResult } from '../online-search/online-search.types';
import { RetrievalService } from '../retrieval/retrieval.service';
import { RetrievedDocument } from '../retrieval/retrieval.types';
import { estimateTokens, trimHistory } from '../sessions/history-trimmer';
import { SESSION_STORE, SessionStore } from '../sessions/session.store';
import { RetrievalError, errorMessage, errorStack } from '../shared/errors';
import { mapWithConcurrency } from '../shared/lib/task-pool';
import { LoggerService } from '../shared/types';
import { SummarizationService } from '../summarization/summarization.service';
import { SummaryContentType, SummaryResult } from '../summarization/summarization.types';
import {
  ChatOutcome,
  ChatRequest,
  Intent,
  OrchestratorState,
  SourceReference,
} from './chat.types';
import { IntentClassifierService } from './intent-classifier.service';
import { formatStructuredAnswer } from './legal-analysis';
import {
  CORRECTIVE_REMINDER,
  GENERIC_FAILURE_MESSAGE,
  REPHRASE_MESSAGE,
  SELF_CHECK_APOLOGY,
  STRUCTURED_ANSWER_INSTRUCTION,
  SYSTEM_PROMPT,
  isRefusal,
  roleInstruction,
  synthesisPrompt,
} from './prompts';

type Gathered =
  | { kind: 'context'; context: string; materials: Material[]; sources: SourceReference[] }
  | { kind: 'none'; message: string };

interface Material {
  text: string;
  url: string | null;
  contentType: SummaryContentType;
}

const SUMMARIZE_MARKER = /summari[sz]e(?:\s+this\s+paragraph)?\s*:/i;
const URL_PATTERN = /https?:\/\/\S+/i;

class Run {
  readonly states: OrchestratorState[] = ['received'];
  sources: SourceReference[] = [];

  constructor(
    readonly request: ChatRequest,
    readonly intent: Intent,
    readonly history: ChatMessage[],
    readonly signal?: AbortSignal,
  ) {}

  enter(state: OrchestratorState): void {
    this.signal?.throwIfAborted();
    this.states.push(state);
  }
}

/**
 * Drives one chat turn: intent routing, vector retrieval with online-search
 * fallback, optional summarization and the final LLM synthesis. Always
 * appends the user message and the produced answer to the session.
 */
@Injectable()
export class LegalAssistantService {
  private readonly logger = new Logger(LegalAssistantService.name);

  constructor(
    private readonly classifier: IntentClassifierService,
    private readonly ai: AiService,
    private readonly retrieval: RetrievalService,
    private readonly onlineSearch: OnlineSearchService,
    private readonly summarization: SummarizationService,
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
    @Inject('LOGGER_SERVICE') private readonly loggerService: LoggerService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  async handle(request: ChatRequest, signal?: AbortSignal): Promise<ChatOutcome> {
    const stored = await this.sessions.get(request.sessionId);
    const seed = stored.length === 0 && request.history?.length ? request.history : [];
    const history = stored.length > 0 ? stored : seed;

    const intent = this.classifier.classify(request.message);
    const run = new Run(request, intent, history, signal);

    this.logger.debug(
      `handle(): session=${request.sessionId} intent=${intent} history=${history.length} role=${request.role ?? '-'}`,
    );

    let response: string;
    let failed = false;
    try {
      response = await this.route(run);
      run.states.push('completed');
    } catch (err) {
      failed = true;
      run.states.push('failed');
      response = GENERIC_FAILURE_MESSAGE;
      await this.loggerService.error(
        `[chat] session=${request.sessionId} intent=${intent} failed after ${run.states.join(' > ')}: ${errorMessage(err)}`,
        errorStack(err),
      );
    }

    await this.sessions.update(request.sessionId, [
      ...seed,
      { role: 'user', content: request.message },
      { role: 'assistant', content: response },
    ]);

    return { response, intent, states: run.states, sources: run.sources, failed };
  }

  private async route(run: Run): Promise<string> {
    if (run.intent === 'casual') {
      run.enter('direct_respond');
      return this.directRespond(run);
    }
    if (run.intent === 'summarize') {
      run.enter('summarizing');
      return this.summarizeMessage(run);
    }

    const gathered = await this.gather(run);
    if (gathered.kind === 'none') return gathered.message;
    run.sources = gathered.sources;

    let context = gathered.context;
    if (run.intent === 'summarize_case') {
      run.enter('summarizing');
      context += await this.summaries(gathered.materials);
    }

    run.enter('synthesizing');
    return this.synthesize(run, context);
  }

  private async directRespond(run: Run): Promise<string> {
    const messages = this.withHistory(SYSTEM_PROMPT, run.history, run.request.message);
    return this.completeWithSelfCheck(messages, { kind: 'directRespond', signal: run.signal });
  }

  private async summarizeMessage(run: Run): Promise<string> {
    const { message } = run.request;
    const marker = SUMMARIZE_MARKER.exec(message);
    const url = URL_PATTERN.exec(message)?.[0];
    const input = marker
      ? message.slice(marker.index + marker[0].length).trim()
      : url ?? message;

    const result = await this.summarization.summarize(input || message);
    if (!result.ok) {
      return `I could not summarize that: ${result.error}.`;
    }
    if (result.url) {
      run.sources = [{ kind: 'online', reference: result.url }];
    }
    return `**Summary**\n\n${result.summary}\n\n**Context**\n\n${result.context}`;
  }

  /** Vector retrieval first; online search exactly once when that is not usable. */
  private async gather(run: Run): Promise<Gathered> {
    const { message, sessionId } = run.request;

    run.enter('retrieving');
    let documents: RetrievedDocument[] = [];
    try {
      documents = await this.retrieval.search(message);
    } catch (err) {
      if (!(err instanceof RetrievalError)) throw err;
      await this.loggerService.error(
        `[retrieval-failure] session=${sessionId}: ${err.message}`,
        errorStack(err),
      );
    }

    if (this.isUsable(documents)) {
      run.enter('retrieved');
      return {
        kind: 'context',
        context: this.retrieval.formatForContext(message, documents),
        materials: documents.map((doc): Material => ({ text: doc.content, url: null, contentType: 'TEXT' })),
        sources: documents.map((doc): SourceReference => ({
          kind: 'vector',
          reference: describeDocument(doc),
          score: doc.score,
        })),
      };
    }

    this.logger.log(
      `session=${sessionId}: vector results not usable (${documents.length} hit(s)), searching online`,
    );
    run.enter('online_searching');
    const results = await this.onlineSearch.search(message);
    const found = results.filter(
      (result): result is Extract<SearchResult, { ok: true }> => result.ok,
    );

    if (found.length === 0) {
      run.enter('exhausted');
      const explanation = results.find((result) => !result.ok && result.url === null);
      return {
        kind: 'none',
        message: explanation && !explanation.ok ? explanation.error : REPHRASE_MESSAGE,
      };
    }

    run.enter('found');
    return {
      kind: 'context',
      context: found
        .map((result) =>
          [`Source: ${result.url}`, result.title ? `Title: ${result.title}` : null, result.content]
            .filter((line): line is string => line !== null)
            .join('\n'),
        )
        .join('\n\n---\n\n'),
      materials: found.map((result): Material => ({
        text: result.content,
        url: result.url,
        contentType: result.contentType,
      })),
      sources: found.map((result): SourceReference => ({ kind: 'online', reference: result.url })),
    };
  }

  private isUsable(documents: RetrievedDocument[]): boolean {
    if (documents.length === 0) return false;
    const chars = documents.reduce((sum, doc) => sum + doc.content.trim().length, 0);
    return chars > this.config.retrieval.minContentChars;
  }

  private async summaries(materials: Material[]): Promise<string> {
    const results: SummaryResult[] = await mapWithConcurrency(
      materials,
      this.config.summarization.concurrency,
      (material) =>
        this.summarization.summarizeText(material.text, material.url, material.contentType),
    );

    const blocks = results.flatMap((result, i) =>
      result.ok
        ? [`Summary ${i + 1}${result.url ? ` (${result.url})` : ''}:\n${result.summary}\n\nCase context:\n${result.context}`]
        : [],
    );
    return blocks.length > 0 ? `\n\nSUMMARIES:\n\n${blocks.join('\n\n')}` : '';
  }

  private async synthesize(run: Run, context: string): Promise<string> {
    const { role } = run.request;
    const system = role
      ? `${SYSTEM_PROMPT}\n\n${roleInstruction(role)}\n\n${STRUCTURED_ANSWER_INSTRUCTION}`
      : SYSTEM_PROMPT;

    const messages = this.withHistory(
      system,
      run.history,
      synthesisPrompt(run.request.message, context),
    );
    const answer = await this.completeWithSelfCheck(messages, {
      kind: 'synthesize',
      json: Boolean(role),
      temperature: role ? 0.1 : 0.2,
      signal: run.signal,
    });

    if (!role || answer === SELF_CHECK_APOLOGY) return answer;
    return formatStructuredAnswer(answer);
  }

  /** `[system, ...trimmed history, prompt]` with the prompt's cost reserved from the budget. */
  private withHistory(system: string, history: ChatMessage[], prompt: string): ChatMessage[] {
    const budget = this.config.context.tokenBudget - estimateTokens(prompt);
    const conversation = history.filter((message) => message.role !== 'system');
    return [
      ...trimHistory([{ role: 'system', content: system }, ...conversation], budget),
      { role: 'user', content: prompt },
    ];
  }

  /**
   * A refusal to use the supplied sources gets one corrective re-prompt; a
   * second refusal is replaced by a fixed apology.
   */
  private async completeWithSelfCheck(
    messages: ChatMessage[],
    opts: CompletionOptions,
  ): Promise<string> {
    const first = await this.ai.complete(messages, opts);
    if (!isRefusal(first)) return first;

    this.logger.warn(`${opts.kind ?? 'complete'}: refusal detected, re-prompting`);
    opts.signal?.throwIfAborted();

    const [head, ...rest] = messages;
    const second = await this.ai.complete(
      [head, { role: 'system', content: CORRECTIVE_REMINDER }, ...rest],
      { ...opts, kind: `${opts.kind ?? 'complete'}:retry` },
    );
    return isRefusal(second) ? SELF_CHECK_APOLOGY : second;
  }
}

function describeDocument(doc: RetrievedDocument): string {
  const { law_name: lawName, section, title } = doc.metadata;
  const parts = [
    lawName !== undefined ? String(lawName) : null,
    section !== undefined ? `Section ${section}` : null,
    title !== undefined ? String(title) : null,
  ].filter((part): part is string => part !== null && part !== '');
  return parts.length > 0 ? parts.join(' - ') : 'Vector document';
}

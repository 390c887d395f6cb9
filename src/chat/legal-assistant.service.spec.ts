import { Test } from '@nestjs/testing';
import { AiService } from '../ai/ai.service';
import { ChatMessage, CompletionOptions } from '../ai/ai.types';
import { assistantConfig } from '../config/assistant.config';
import { OnlineSearchService } from '../online-search/online-search.service';
import { NO_RESULTS_MESSAGE, SearchResult } from '../online-search/online-search.types';
import { formatRetrievedDocuments } from '../retrieval/context-formatter';
import { RetrievalService } from '../retrieval/retrieval.service';
import { RetrievedDocument } from '../retrieval/retrieval.types';
import { estimateTokens } from '../sessions/history-trimmer';
import { InMemorySessionStore } from '../sessions/in-memory-session.store';
import { SESSION_STORE } from '../sessions/session.store';
import { RetrievalError, SynthesisError } from '../shared/errors';
import { RedactedRequest } from '../shared/types';
import { SummarizationService } from '../summarization/summarization.service';
import { SummaryContentType, SummaryResult } from '../summarization/summarization.types';
import { testConfig } from '../test-utils/config';
import { IntentClassifierService } from './intent-classifier.service';
import { LegalAssistantService } from './legal-assistant.service';
import {
  CORRECTIVE_REMINDER,
  GENERIC_FAILURE_MESSAGE,
  SELF_CHECK_APOLOGY,
  SYSTEM_PROMPT,
  roleInstruction,
} from './prompts';

const SECTION_420 =
  'Whoever cheats and thereby dishonestly induces the person deceived to deliver any property shall be punished.';

function doc(score: number, section: string, content = SECTION_420): RetrievedDocument {
  return { content, metadata: { law_name: 'IPC', section }, score };
}

describe('LegalAssistantService', () => {
  const complete = jest.fn<Promise<string>, [ChatMessage[], CompletionOptions?]>();
  const search = jest.fn<Promise<RetrievedDocument[]>, [string]>();
  const onlineSearch = jest.fn<Promise<SearchResult[]>, [string]>();
  const summarize = jest.fn<Promise<SummaryResult>, [string]>();
  const summarizeText = jest.fn<
    Promise<SummaryResult>,
    [string, (string | null)?, SummaryContentType?]
  >();
  const logError = jest.fn<Promise<void>, [string, string?, RedactedRequest?]>();

  let sessions: InMemorySessionStore;

  async function build(env: Record<string, string> = {}) {
    sessions = new InMemorySessionStore(0);
    const module = await Test.createTestingModule({
      providers: [
        LegalAssistantService,
        IntentClassifierService,
        { provide: AiService, useValue: { complete } },
        {
          provide: RetrievalService,
          useValue: { search, formatForContext: formatRetrievedDocuments },
        },
        { provide: OnlineSearchService, useValue: { search: onlineSearch } },
        { provide: SummarizationService, useValue: { summarize, summarizeText } },
        { provide: SESSION_STORE, useValue: sessions },
        {
          provide: 'LOGGER_SERVICE',
          useValue: {
            app: 'test',
            error: logError,
            log: jest.fn(),
            warn: jest.fn(),
            debug: jest.fn(),
          },
        },
        { provide: assistantConfig.KEY, useValue: testConfig(env) },
      ],
    }).compile();
    return module.get(LegalAssistantService);
  }

  function lastPrompt(call = 0): string {
    const messages = complete.mock.calls[call][0];
    return messages[messages.length - 1].content;
  }

  beforeEach(() => {
    complete.mockResolvedValue('Section 420 IPC covers cheating.');
    logError.mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  it('should answer casual messages directly without touching the adapters', async () => {
    const service = await build();

    const outcome = await service.handle({ message: 'hello there', sessionId: 's1' });

    expect(outcome).toEqual({
      response: 'Section 420 IPC covers cheating.',
      intent: 'casual',
      states: ['received', 'direct_respond', 'completed'],
      sources: [],
      failed: false,
    });
    expect(search).not.toHaveBeenCalled();
    expect(onlineSearch).not.toHaveBeenCalled();
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'hello there' },
    ]);
    expect(await sessions.get('s1')).toEqual([
      { role: 'user', content: 'hello there' },
      { role: 'assistant', content: 'Section 420 IPC covers cheating.' },
    ]);
  });

  it('should synthesize from vector results without going online when they are usable', async () => {
    const service = await build();
    search.mockResolvedValue([doc(0.81, '420'), doc(0.76, '415'), doc(0.6, '417')]);

    const outcome = await service.handle({
      message: 'What is the punishment for cheating under IPC?',
      sessionId: 's1',
    });

    expect(onlineSearch).not.toHaveBeenCalled();
    expect(complete).toHaveBeenCalledTimes(1);
    expect(outcome.intent).toBe('general');
    expect(outcome.states).toEqual([
      'received',
      'retrieving',
      'retrieved',
      'synthesizing',
      'completed',
    ]);
    expect(outcome.sources).toEqual([
      { kind: 'vector', reference: 'IPC - Section 420', score: 0.81 },
      { kind: 'vector', reference: 'IPC - Section 415', score: 0.76 },
      { kind: 'vector', reference: 'IPC - Section 417', score: 0.6 },
    ]);
    expect(lastPrompt()).toContain('FOUND 3 RELEVANT LEGAL DOCUMENTS:');
    expect(lastPrompt()).toContain('USER QUERY: What is the punishment for cheating under IPC?');
  });

  it('should fall back to online search once when vector search is empty', async () => {
    const service = await build();
    search.mockResolvedValue([]);
    onlineSearch.mockResolvedValue([
      {
        ok: true,
        url: 'https://indiacode.nic.in/ipc-420',
        title: 'IPC 420',
        content: 'Section 420 deals with cheating and dishonest inducement.',
        contentType: 'HTML',
      },
      { ok: false, url: 'https://example.gov.in/broken.pdf', error: 'No readable text extracted' },
    ]);

    const outcome = await service.handle({ message: 'cheating law in india', sessionId: 's1' });

    expect(onlineSearch).toHaveBeenCalledTimes(1);
    expect(onlineSearch).toHaveBeenCalledWith('cheating law in india');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(lastPrompt()).toContain(
      'Source: https://indiacode.nic.in/ipc-420\nTitle: IPC 420\nSection 420 deals with cheating and dishonest inducement.',
    );
    expect(lastPrompt()).not.toContain('broken.pdf');
    expect(outcome.states).toEqual([
      'received',
      'retrieving',
      'online_searching',
      'found',
      'synthesizing',
      'completed',
    ]);
    expect(outcome.sources).toEqual([{ kind: 'online', reference: 'https://indiacode.nic.in/ipc-420' }]);
  });

  it('should treat short vector content as low quality', async () => {
    const service = await build();
    search.mockResolvedValue([doc(0.9, '420', 'Cheating.')]);
    onlineSearch.mockResolvedValue([{ ok: false, url: null, error: NO_RESULTS_MESSAGE }]);

    const outcome = await service.handle({ message: 'section 420 ipc', sessionId: 's1' });

    expect(onlineSearch).toHaveBeenCalledTimes(1);
    expect(complete).not.toHaveBeenCalled();
    expect(outcome.response).toBe(NO_RESULTS_MESSAGE);
    expect(outcome.states).toEqual([
      'received',
      'retrieving',
      'online_searching',
      'exhausted',
      'completed',
    ]);
    expect(outcome.failed).toBe(false);
  });

  it('should log retrieval failures separately and continue online', async () => {
    const service = await build();
    search.mockRejectedValue(new RetrievalError('Vector search failed on pgvector: connection refused'));
    onlineSearch.mockResolvedValue([
      {
        ok: true,
        url: 'https://lawmin.gov.in/bail',
        content: 'Bail provisions under the code of criminal procedure.',
        contentType: 'HTML',
      },
    ]);

    const outcome = await service.handle({ message: 'bail for a bailable offence', sessionId: 's1' });

    expect(logError).toHaveBeenCalledTimes(1);
    expect(logError.mock.calls[0][0]).toBe(
      '[retrieval-failure] session=s1: Vector search failed on pgvector: connection refused',
    );
    expect(onlineSearch).toHaveBeenCalledTimes(1);
    expect(outcome.failed).toBe(false);
    expect(outcome.response).toBe('Section 420 IPC covers cheating.');
  });

  it('should re-prompt once when the model refuses and keep the second answer', async () => {
    const service = await build();
    complete
      .mockResolvedValueOnce('I am unable to perform online searches right now.')
      .mockResolvedValueOnce('Here is what the law says.');

    const outcome = await service.handle({ message: 'hi', sessionId: 's1' });

    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1][0][1]).toEqual({ role: 'system', content: CORRECTIVE_REMINDER });
    expect(outcome.response).toBe('Here is what the law says.');
  });

  it('should apologise when the model refuses twice', async () => {
    const service = await build();
    complete.mockResolvedValue("Based on the data I've been trained on, I cannot say.");

    const outcome = await service.handle({ message: 'hi', sessionId: 's1' });

    expect(complete).toHaveBeenCalledTimes(2);
    expect(outcome.response).toBe(SELF_CHECK_APOLOGY);
  });

  it('should trim history to the token budget and keep the system prompt', async () => {
    const budget = estimateTokens(SYSTEM_PROMPT) + estimateTokens('hi') + 10;
    const service = await build({ CONTEXT_TOKEN_BUDGET: String(budget) });
    await sessions.update('s1', [
      { role: 'user', content: 'a'.repeat(40) },
      { role: 'assistant', content: 'b'.repeat(40) },
      { role: 'user', content: 'c'.repeat(20) },
    ]);

    await service.handle({ message: 'hi', sessionId: 's1' });

    expect(complete.mock.calls[0][0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'c'.repeat(20) },
      { role: 'user', content: 'hi' },
    ]);
  });

  it('should seed request history only into an empty session', async () => {
    const service = await build();
    const history: ChatMessage[] = [
      { role: 'user', content: 'earlier question' },
      { role: 'assistant', content: 'earlier answer' },
    ];

    await service.handle({ message: 'hi', sessionId: 's1', history });
    await service.handle({
      message: 'hello',
      sessionId: 's1',
      history: [{ role: 'user', content: 'ignored' }],
    });

    const stored = await sessions.get('s1');
    expect(stored.map((message) => message.content)).toEqual([
      'earlier question',
      'earlier answer',
      'hi',
      'Section 420 IPC covers cheating.',
      'hello',
      'Section 420 IPC covers cheating.',
    ]);
    expect(complete.mock.calls[0][0]).toHaveLength(4);
  });

  it('should record the generic apology when synthesis fails', async () => {
    const service = await build();
    search.mockResolvedValue([doc(0.8, '420')]);
    complete.mockRejectedValue(new SynthesisError('LLM call failed (synthesize)'));

    const outcome = await service.handle({ message: 'punishment for cheating under ipc', sessionId: 's1' });

    expect(outcome.failed).toBe(true);
    expect(outcome.response).toBe(GENERIC_FAILURE_MESSAGE);
    expect(outcome.states[outcome.states.length - 1]).toBe('failed');
    expect(logError).toHaveBeenCalledTimes(1);
    expect(logError.mock.calls[0][0]).toContain('LLM call failed (synthesize)');
    expect(await sessions.get('s1')).toEqual([
      { role: 'user', content: 'punishment for cheating under ipc' },
      { role: 'assistant', content: GENERIC_FAILURE_MESSAGE },
    ]);
  });

  it('should ask for structured output when a party role is set', async () => {
    const service = await build();
    search.mockResolvedValue([doc(0.8, '420')]);
    complete.mockResolvedValue(
      JSON.stringify({ applicable_laws: [], key_risks: ['Weak documentary evidence'] }),
    );

    const outcome = await service.handle({
      message: 'I am accused of cheating under section 420',
      sessionId: 's1',
      role: 'defense',
    });

    const [messages, opts] = complete.mock.calls[0];
    expect(messages[0].content).toContain(roleInstruction('defense'));
    expect(opts).toEqual(expect.objectContaining({ json: true, temperature: 0.1 }));
    expect(outcome.response).toBe('### Key Legal Risks\n- Weak documentary evidence');
  });

  it('should summarize the text after a summarize marker', async () => {
    const service = await build();
    summarize.mockResolvedValue({
      ok: true,
      url: null,
      summary: 'Bail was granted.',
      context: 'Court Level: Sessions Court',
      contentType: 'TEXT',
    });

    const outcome = await service.handle({
      message: 'Summarize: The accused was granted bail by the sessions court.',
      sessionId: 's1',
    });

    expect(summarize).toHaveBeenCalledWith('The accused was granted bail by the sessions court.');
    expect(search).not.toHaveBeenCalled();
    expect(outcome.states).toEqual(['received', 'summarizing', 'completed']);
    expect(outcome.response).toBe(
      '**Summary**\n\nBail was granted.\n\n**Context**\n\nCourt Level: Sessions Court',
    );
  });

  it('should add summaries of the retrieved material for summarize_case', async () => {
    const service = await build();
    search.mockResolvedValue([doc(0.8, '420')]);
    summarizeText.mockResolvedValue({
      ok: true,
      url: null,
      summary: 'Cheating is punishable.',
      context: 'Court Level: Other',
      contentType: 'TEXT',
    });

    const outcome = await service.handle({ message: 'summarize the cheating case', sessionId: 's1' });

    expect(outcome.intent).toBe('summarize_case');
    expect(summarizeText).toHaveBeenCalledWith(SECTION_420, null, 'TEXT');
    expect(lastPrompt()).toContain(
      'SUMMARIES:\n\nSummary 1:\nCheating is punishable.\n\nCase context:\nCourt Level: Other',
    );
    expect(outcome.states).toEqual([
      'received',
      'retrieving',
      'retrieved',
      'summarizing',
      'synthesizing',
      'completed',
    ]);
  });

  it('should stop at the next stage once the request is aborted', async () => {
    const service = await build();
    const controller = new AbortController();
    controller.abort();

    const outcome = await service.handle({ message: 'hi', sessionId: 's1' }, controller.signal);

    expect(outcome.failed).toBe(true);
    expect(outcome.states).toEqual(['received', 'failed']);
    expect(complete).not.toHaveBeenCalled();
  });
});

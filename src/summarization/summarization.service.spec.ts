import { Test } from '@nestjs/testing';
import { SummarizationService, SUMMARY_FAILED_MESSAGE } from './summarization.service';
import { AiService } from '../ai/ai.service';
import { ChatMessage, CompletionOptions } from '../ai/ai.types';
import { assistantConfig } from '../config/assistant.config';
import { ContentFetcherService } from '../extraction/content-fetcher.service';
import { SynthesisError } from '../shared/errors';
import { testConfig } from '../test-utils/config';
import { createStubHttp } from '../test-utils/http-stub';

function htmlPage(text: string) {
  return {
    data: Buffer.from(`<article><p>${text}</p></article>`),
    headers: { 'content-type': 'text/html' },
  };
}

describe('SummarizationService', () => {
  const complete = jest.fn<Promise<string>, [ChatMessage[], CompletionOptions?]>();

  async function build(handler: Parameters<typeof createStubHttp>[0]) {
    const config = testConfig();
    const { http, requests } = createStubHttp(handler);
    const module = await Test.createTestingModule({
      providers: [
        SummarizationService,
        { provide: AiService, useValue: { complete } },
        { provide: ContentFetcherService, useValue: new ContentFetcherService(http, config) },
        { provide: assistantConfig.KEY, useValue: config },
      ],
    }).compile();
    return { service: module.get(SummarizationService), requests };
  }

  beforeEach(() => {
    complete.mockImplementation(async (_messages, opts) =>
      opts?.kind === 'summarize' ? 'A short summary.' : 'Court Level: High Court',
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should summarize plain text with two LLM calls', async () => {
    const { service } = await build(() => htmlPage('unused'));

    const result = await service.summarize('The petitioner challenged the detention order before the court.');

    expect(result).toEqual({
      ok: true,
      url: null,
      summary: 'A short summary.',
      context: 'Court Level: High Court',
      contentType: 'TEXT',
    });
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should only send the first part of the text to context extraction', async () => {
    const { service } = await build(() => htmlPage('unused'));
    const text = `${'a'.repeat(3000)}TAIL`;

    await service.summarizeText(text);

    const contextCall = complete.mock.calls.find(([, opts]) => opts?.kind === 'extractContext');
    const prompt = contextCall?.[0][0].content ?? '';
    expect(prompt).toContain('a'.repeat(3000));
    expect(prompt).not.toContain('TAIL');
  });

  it('should fetch URL inputs and keep the detected content type', async () => {
    const { service } = await build(() =>
      htmlPage('The Supreme Court held that the right to privacy is a fundamental right.'),
    );

    const result = await service.summarize(' https://main.sci.gov.in/judgment ');

    expect(result).toMatchObject({ ok: true, url: 'https://main.sci.gov.in/judgment', contentType: 'HTML' });
  });

  it('should return an error entry when the fetch fails', async () => {
    const { service } = await build(() => ({ status: 404 }));

    await expect(service.summarizeUrl('https://a.gov.in/missing')).resolves.toEqual({
      ok: false,
      url: 'https://a.gov.in/missing',
      error: 'Request failed with status code 404',
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('should return an error entry when the LLM fails', async () => {
    complete.mockRejectedValue(new SynthesisError('LLM call failed (summarize)'));
    const { service } = await build(() => htmlPage('unused'));

    await expect(service.summarizeText('Some judgment text')).resolves.toEqual({
      ok: false,
      url: null,
      error: SUMMARY_FAILED_MESSAGE,
    });
  });

  it('should keep input order and isolate failures in summarizeMany', async () => {
    const { service } = await build((request) =>
      request.url?.includes('broken')
        ? { status: 404 }
        : htmlPage(`Judgment body for ${request.url} with enough words to matter.`),
    );

    const results = await service.summarizeMany(
      ['https://a.gov.in/one', 'https://a.gov.in/broken', 'https://a.gov.in/three'],
      2,
    );

    expect(results.map((r) => [r.url, r.ok])).toEqual([
      ['https://a.gov.in/one', true],
      ['https://a.gov.in/broken', false],
      ['https://a.gov.in/three', true],
    ]);
  });

  it('should never run more than the concurrency limit at once', async () => {
    let active = 0;
    let peak = 0;
    const { service } = await build(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return htmlPage('Text of the order passed by the tribunal in the appeal.');
    });

    await service.summarizeMany(
      ['https://a.gov.in/1', 'https://a.gov.in/2', 'https://a.gov.in/3', 'https://a.gov.in/4', 'https://a.gov.in/5'],
      2,
    );

    expect(peak).toBe(2);
  });
});

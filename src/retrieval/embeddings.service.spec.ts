import { EmbeddingsService } from './embeddings.service';
import { RetrievalError } from '../shared/errors';
import { testConfig } from '../test-utils/config';
import { bodyOf, createStubHttp } from '../test-utils/http-stub';

describe('EmbeddingsService', () => {
  it('should post the batch and return vectors in input order', async () => {
    const { http, requests } = createStubHttp(() => ({
      data: {
        data: [
          { index: 1, embedding: [0.3, 0.4] },
          { index: 0, embedding: [0.1, 0.2] },
        ],
      },
    }));
    const service = new EmbeddingsService(http, testConfig({ EMBEDDING_MODEL: 'test-embed' }));

    await expect(service.embedMany(['first', 'second'])).resolves.toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.openai.com/v1/embeddings');
    expect(requests[0].headers.Authorization).toBe('Bearer test-secret');
    expect(bodyOf(requests[0])).toEqual({ input: ['first', 'second'], model: 'test-embed' });
  });

  it('should raise a RetrievalError when the provider fails', async () => {
    const { http } = createStubHttp(() => ({ status: 500, data: { error: 'down' } }));
    const service = new EmbeddingsService(http, testConfig());

    await expect(service.embed('bail')).rejects.toBeInstanceOf(RetrievalError);
  });

  it('should raise a RetrievalError when no vector comes back', async () => {
    const { http } = createStubHttp(() => ({ data: { data: [] } }));
    const service = new EmbeddingsService(http, testConfig());

    await expect(service.embed('bail')).rejects.toThrow('Failed to generate embedding');
  });
});

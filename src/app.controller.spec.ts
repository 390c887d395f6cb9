import { Test } from '@nestjs/testing';
import { AppController } from './app.controller';
import { assistantConfig } from './config/assistant.config';
import { RetrievalService } from './retrieval/retrieval.service';
import { RetrievalError } from './shared/errors';
import { testConfig } from './test-utils/config';

describe('AppController', () => {
  const ping = jest.fn<Promise<void>, []>();
  let controller: AppController;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        { provide: RetrievalService, useValue: { ping } },
        { provide: assistantConfig.KEY, useValue: testConfig({ STATUS_TIMEOUT_MS: '20' }) },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  it('should be healthy when the vector backend answers', async () => {
    ping.mockResolvedValue(undefined);
    expect(await controller.health()).toEqual({ status: 'healthy', timestamp: expect.any(Number) });
  });

  it('should be unhealthy when the backend fails', async () => {
    ping.mockRejectedValue(new RetrievalError('connection refused'));
    expect((await controller.health()).status).toBe('unhealthy');
  });

  it('should be unhealthy when the backend does not answer in time', async () => {
    ping.mockReturnValue(new Promise<void>(() => undefined));
    expect((await controller.health()).status).toBe('unhealthy');
  });
});

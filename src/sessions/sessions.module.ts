// src/sessions/sessions.module.ts
import { Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { CachedSessionStore } from './cached-session.store';
import { InMemorySessionStore } from './in-memory-session.store';
import { RedisSessionStore } from './redis-session.store';
import { SESSION_STORE, SessionStore } from './session.store';

@Module({
  providers: [
    {
      provide: SESSION_STORE,
      inject: [assistantConfig.KEY],
      useFactory: (config: AssistantConfig): SessionStore => {
        const { sessions } = config;
        const logger = new Logger('SessionsModule');

        if (sessions.backend === 'redis') {
          const redis = new Redis(sessions.redisUrl, { maxRetriesPerRequest: 3 });
          redis.on('error', (err: Error) => logger.error(`[redis] ${err.message}`, err.stack));
          logger.log(`session store: redis (${sessions.redisUrl.replace(/\/\/[^@]*@/, '//***@')})`);

          return new CachedSessionStore(
            new RedisSessionStore(redis, {
              keyPrefix: sessions.keyPrefix,
              idleTtlMs: sessions.idleTtlMs,
            }),
            sessions.readCacheTtlMs,
          );
        }

        logger.log(`session store: memory (idle ttl ${sessions.idleTtlMs}ms)`);
        return new InMemorySessionStore(sessions.idleTtlMs);
      },
    },
  ],
  exports: [SESSION_STORE],
})
export class SessionsModule implements OnModuleDestroy {
  constructor(@Inject(SESSION_STORE) private readonly store: SessionStore) {}

  async onModuleDestroy(): Promise<void> {
    await this.store.close?.();
  }
}

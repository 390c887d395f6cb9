// src/shared/lib/http/http.module.ts
import { Module } from '@nestjs/common';
import axios from 'axios';

export const HTTP_CLIENT = 'HTTP_CLIENT';

/**
 * One axios instance shared by every outbound REST integration
 * (embeddings, Qdrant, Tavily, page fetches). Per-call options carry
 * the URL, headers and timeout.
 */
@Module({
  providers: [
    {
      provide: HTTP_CLIENT,
      useFactory: () =>
        axios.create({
          headers: {
            'User-Agent': process.env.HTTP_USER_AGENT || 'statute-assistant/0.1 (+legal research)',
          },
          maxRedirects: 5,
        }),
    },
  ],
  exports: [HTTP_CLIENT],
})
export class HttpModule {}

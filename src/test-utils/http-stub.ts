import axios, {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export interface StubReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (
  request: InternalAxiosRequestConfig,
) => StubReply | Promise<StubReply>;

/**
 * In-process stand-in for the network: an axios instance whose adapter
 * answers from `handler` and records every request it sees.
 */
export function createStubHttp(handler: StubHandler): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const reply = await handler(config);
      const response: AxiosResponse = {
        data: reply.data ?? null,
        status: reply.status ?? 200,
        statusText: String(reply.status ?? 200),
        headers: reply.headers ?? {},
        config,
      };
      if (response.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${response.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          undefined,
          response,
        );
      }
      return response;
    },
  });

  return { http, requests };
}

export function timeoutError(config: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError('timeout exceeded', AxiosError.ECONNABORTED, config);
}

/** Parsed JSON body of a recorded request. */
export function bodyOf(request: InternalAxiosRequestConfig): unknown {
  return typeof request.data === 'string' ? JSON.parse(request.data) : request.data;
}

import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type FakeRoute = (request: InternalAxiosRequestConfig) => FakeReply;

/**
 * axios adapter answering from in-process routes keyed by request path. Unknown paths
 * get a 404; replies failing `validateStatus` reject the way axios' own adapters do.
 */
export function fakeHttp(routes: Record<string, FakeRoute>) {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (request) => {
    requests.push(request);
    const route = routes[request.url ?? ''];
    const reply = route ? route(request) : { status: 404, data: { message: 'Not Found' } };
    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: reply.data ?? null,
      status,
      statusText: String(status),
      headers: reply.headers ?? {},
      config: request,
    };

    const valid = request.validateStatus ? request.validateStatus(status) : status < 400;
    if (!valid) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, request, null, response);
    }
    return response;
  };

  return {
    adapter,
    requests,
    requestsTo: (path: string) => requests.filter((request) => request.url === path),
  };
}

export function pageParam(request: InternalAxiosRequestConfig): number {
  const params: unknown = request.params;
  if (typeof params === 'object' && params !== null && 'page' in params && typeof params.page === 'number') {
    return params.page;
  }
  return 1;
}

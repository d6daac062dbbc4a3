/**
 * Just enough of fetch for the feed and relay clients; tests pass a stub.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: RequestInit) => Promise<HttpResponse>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);

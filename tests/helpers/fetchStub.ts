import { vi } from "vitest";

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: unknown;
}

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * Replace the global fetch for the current test and record every call
 */
export function stubFetch(handler: FetchHandler): RecordedRequest[] {
  const requests: RecordedRequest[] = [];

  const fetchStub = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const request: RecordedRequest = {
      url: input instanceof Request ? input.url : input.toString(),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    return await handler(request);
  });

  vi.stubGlobal("fetch", fetchStub);
  return requests;
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function namedError(name: string, message: string): Error {
  const failure = new Error(message);
  failure.name = name;
  return failure;
}

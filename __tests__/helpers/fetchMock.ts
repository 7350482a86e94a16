/**
 * Route global `fetch` calls to an in-process handler. Unrouted URLs get a 404.
 */
export type RouteHandler = (url: URL, init?: RequestInit) => Response | Promise<Response> | undefined;

export function routeFetch(handler: RouteHandler) {
  return jest.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const res = await handler(new URL(href), init);
    return res ?? new Response('not found', { status: 404 });
  });
}

export function text(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/dns-json' },
  });
}

export const noSleep = async (): Promise<void> => {};

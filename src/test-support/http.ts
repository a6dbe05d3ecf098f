/**
 * Fake HTTP responses for tests that inject a `FetchFn`.
 */

import type { HttpResponse } from '../http'

export function createMockResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null
    },
    text: async () => body,
    json: async (): Promise<unknown> => JSON.parse(body)
  }
}

/**
 * A chat completions response carrying `content`.
 */
export function completionResponse(content: string): HttpResponse {
  return createMockResponse(200, JSON.stringify({ choices: [{ message: { content } }] }))
}

import { vi } from 'vitest';
import { jsonResponse } from '@credential-providers/core/testing';

// Mock fetch globally for IAM requests
export const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

export const IAM_TEST_ENDPOINT = 'https://iam.example.com';

export type Route = (init: RequestInit | undefined) => Response;

/**
 * Answers each `METHOD url` key with its route; the IAM token endpoint always
 * answers with a token. Unknown requests fail the test.
 */
export function routeFetch(routes: Record<string, Route>): void {
  mockFetch.mockImplementation(async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    if (url === `${IAM_TEST_ENDPOINT}/identity/token`) {
      return jsonResponse({ access_token: 'test-iam-token', expires_in: 3600 });
    }
    const route = routes[`${init?.method ?? 'GET'} ${url}`];
    if (!route) {
      throw new Error(`unexpected request ${init?.method ?? 'GET'} ${url}`);
    }
    return route(init);
  });
}

/**
 * Requests sent to IAM, excluding token requests.
 */
export function apiCalls(): string[] {
  return mockFetch.mock.calls
    .map(([input, init]) => `${init?.method ?? 'GET'} ${String(input)}`)
    .filter((call) => !call.endsWith('/identity/token'));
}

export const createdKey = {
  id: 'ApiKey-0001',
  crn: 'crn:v1:test:public:iam-identity::a/acc-1::apikey:ApiKey-0001',
  iam_id: 'IBMid-0001',
  account_id: 'acc-1',
  apikey: 'test-apikey-value',
};

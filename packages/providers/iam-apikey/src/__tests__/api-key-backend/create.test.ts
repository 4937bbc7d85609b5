import { describe, it, expect, beforeEach } from 'vitest';
import { IamAuthenticator, ProviderError, ProviderErrorKind } from '@credential-providers/core';
import {
  createInstantRetryPolicy,
  createTestLogger,
  jsonResponse,
} from '@credential-providers/core/testing';
import { BackendHttpClient } from '@credential-providers/core';
import { IamApiKeyBackend } from '../../api-key-backend.js';
import type { IamApiKeyConfig } from '../../types.js';
import { IAM_TEST_ENDPOINT, apiCalls, createdKey, mockFetch, routeFetch } from './test-utils.js';

const config: IamApiKeyConfig = {
  apiKeySecretId: 'login-1',
  url: IAM_TEST_ENDPOINT,
  iamId: 'IBMid-0001',
  accountId: 'acc-1',
  supportSessions: true,
  actionWhenLeaked: 'disable',
  name: 'my-secret-123456',
  description: 'test key',
};

function createBackend(): IamApiKeyBackend {
  const logger = createTestLogger();
  return new IamApiKeyBackend({
    url: IAM_TEST_ENDPOINT,
    logger,
    http: new BackendHttpClient({ logger, retryPolicy: createInstantRetryPolicy() }),
    authenticator: new IamAuthenticator({ apiKey: 'test-apikey', url: IAM_TEST_ENDPOINT }),
  });
}

describe('IamApiKeyBackend.create', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should create a locked key and return its payload', async () => {
    let sent: RequestInit | undefined;
    routeFetch({
      [`POST ${IAM_TEST_ENDPOINT}/v1/apikeys`]: (init) => {
        sent = init;
        return jsonResponse(createdKey, 201);
      },
    });

    const credential = await createBackend().create(config);

    expect(credential).toEqual({
      id: 'ApiKey-0001',
      payload: {
        apikey: 'test-apikey-value',
        id: 'ApiKey-0001',
        crn: 'crn:v1:test:public:iam-identity::a/acc-1::apikey:ApiKey-0001',
        iam_id: 'IBMid-0001',
        account_id: 'acc-1',
      },
    });
    expect(sent?.headers).toMatchObject({
      Authorization: 'Bearer test-iam-token',
      'Entity-Lock': 'true',
      'Entity-Disable': 'false',
    });
    expect(JSON.parse(String(sent?.body))).toEqual({
      name: 'my-secret-123456',
      description: 'test key',
      iam_id: 'IBMid-0001',
      account_id: 'acc-1',
      support_sessions: true,
      action_when_leaked: 'disable',
    });
  });

  it('should omit action_when_leaked when unset', async () => {
    let sent: RequestInit | undefined;
    routeFetch({
      [`POST ${IAM_TEST_ENDPOINT}/v1/apikeys`]: (init) => {
        sent = init;
        return jsonResponse(createdKey, 201);
      },
    });

    await createBackend().create({ ...config, actionWhenLeaked: undefined });

    expect(JSON.parse(String(sent?.body))).not.toHaveProperty('action_when_leaked');
  });

  it('should surface a rejection with the IAM message and no retry', async () => {
    routeFetch({
      [`POST ${IAM_TEST_ENDPOINT}/v1/apikeys`]: () =>
        jsonResponse({ errors: [{ code: 'invalid_iam_id', message: 'IAM ID is invalid' }] }, 400),
    });

    const error = await createBackend()
      .create(config)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.kind).toBe(ProviderErrorKind.BackendPermanent);
      expect(error.message).toBe(
        'iam-apikey: failed to create credentials: create API key my-secret-123456: HTTP 400: IAM ID is invalid',
      );
    }
    expect(apiCalls()).toEqual([`POST ${IAM_TEST_ENDPOINT}/v1/apikeys`]);
  });

  it('should retry an unavailable IAM four times in total', async () => {
    routeFetch({
      [`POST ${IAM_TEST_ENDPOINT}/v1/apikeys`]: () => jsonResponse({ errors: [] }, 503),
    });

    const error = await createBackend()
      .create(config)
      .catch((caught: unknown) => caught);

    expect(apiCalls()).toHaveLength(4);
    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.kind).toBe(ProviderErrorKind.BackendTransient);
    }
  });
});

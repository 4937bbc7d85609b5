import { describe, it, expect } from 'vitest';
import { defineJob, type CredentialBackend } from '@credential-providers/core';
import { ProviderRegistry } from '../registry.js';

function createJob(name: string, description = 'test job') {
  return defineJob<Record<string, never>>({
    name,
    description,
    parameters: { SMOUT_TOKEN: { type: 'string', required: true } },
    toConfig: () => ({}),
    connect: async (): Promise<CredentialBackend<Record<string, never>>> => ({
      name,
      create: async () => ({ id: '1', payload: { token: 'test-token' } }),
      revoke: async () => {},
    }),
  });
}

describe('ProviderRegistry', () => {
  it('should look jobs up by name', () => {
    const job = createJob('alpha');
    const registry = new ProviderRegistry().register(job);

    expect(registry.get('alpha')).toBe(job);
    expect(registry.get('beta')).toBeUndefined();
  });

  it('should replace a job registered under the same name', () => {
    const replacement = createJob('alpha', 'second');
    const registry = new ProviderRegistry().register(createJob('alpha', 'first')).register(replacement);

    expect(registry.list()).toEqual([replacement]);
  });

  it('should list names in order', () => {
    const registry = new ProviderRegistry().register(createJob('zeta')).register(createJob('alpha'));

    expect(registry.getAllNames()).toEqual(['alpha', 'zeta']);
  });
});

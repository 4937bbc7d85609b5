import { vi, type Mock } from 'vitest';
import type { Credential } from '@credential-providers/models';
import type { BoundBackend } from '../../backend/index.js';

export interface MockBackend extends BoundBackend {
  create: Mock<() => Promise<Credential>>;
  revoke: Mock<(credentialId: string) => Promise<void>>;
  close: Mock<() => Promise<void>>;
}

/**
 * Backend whose create returns `credential` and whose revoke succeeds.
 */
export function createMockBackend(
  credential: Credential = { id: 'cred-1', payload: { token: 'test-token' } },
): MockBackend {
  return {
    name: 'mock',
    create: vi.fn<() => Promise<Credential>>().mockResolvedValue(credential),
    revoke: vi.fn<(credentialId: string) => Promise<void>>().mockResolvedValue(undefined),
    close: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  };
}

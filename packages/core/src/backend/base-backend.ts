import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import { ProviderError } from '../errors/index.js';
import type { CredentialBackend } from './types.js';

/**
 * Abstract base class for credential backends.
 *
 * Adds the backend name and the operation to every error and logs each
 * successful call. Concrete backends implement `doCreate` and `doRevoke`.
 * @example
 * ```typescript
 * export class MyBackend extends BaseCredentialBackend<MyConfig> {
 *   constructor(logger: Logger) {
 *     super('my-backend', logger);
 *   }
 *
 *   protected async doCreate(config: MyConfig): Promise<Credential> {
 *     return { id: '42', payload: { token: '...' } };
 *   }
 *
 *   protected async doRevoke(): Promise<void> {}
 * }
 * ```
 * @public
 */
export abstract class BaseCredentialBackend<TParams> implements CredentialBackend<TParams> {
  public readonly name: string;
  protected readonly logger: Logger;

  protected constructor(name: string, logger: Logger) {
    this.name = name;
    this.logger = logger;
  }

  public async create(params: TParams): Promise<Credential> {
    let credential: Credential;
    try {
      credential = await this.doCreate(params);
    } catch (error) {
      throw ProviderError.wrap(error, `${this.name}: failed to create credentials`);
    }
    this.logger.info({ credentialId: credential.id }, 'credentials created');
    return credential;
  }

  public async revoke(credentialId: string): Promise<void> {
    try {
      await this.doRevoke(credentialId);
    } catch (error) {
      throw ProviderError.wrap(error, `${this.name}: failed to revoke credentials ${credentialId}`);
    }
    this.logger.info({ credentialId }, 'credentials revoked');
  }

  public async close(): Promise<void> {
    // nothing held by default
  }

  protected abstract doCreate(params: TParams): Promise<Credential>;

  /**
   * Must resolve when the credential does not exist.
   */
  protected abstract doRevoke(credentialId: string): Promise<void>;
}

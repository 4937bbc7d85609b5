import { parseParameterDeclarations, readParameters } from '../config/index.js';
import type { BoundBackend, JobDefinition, ProviderJob } from './types.js';

/**
 * Validates a job definition's declarations and wraps it for the dispatcher.
 *
 * Invalid declarations throw here, when the provider module loads, rather
 * than during a run.
 * @example
 * ```typescript
 * export const certificateJob = defineJob<CertificateConfig>({
 *   name: 'certificate',
 *   description: 'Self-signed certificates',
 *   parameters: { SMIN_COMMON_NAME: { type: 'string', required: true }, ... },
 *   toConfig: (values) => ({ commonName: values.requireString('SMIN_COMMON_NAME') }),
 *   connect: async (_config, deps) => new CertificateBackend(deps.logger),
 * });
 * ```
 * @public
 */
export function defineJob<TConfig>(definition: JobDefinition<TConfig>): ProviderJob {
  const declarations = parseParameterDeclarations(definition.parameters);

  return {
    name: definition.name,
    description: definition.description,
    declarations,
    configure(env, context) {
      const values = readParameters(declarations, env);
      const config = definition.toConfig(values, context);

      return {
        async connect(deps): Promise<BoundBackend> {
          const backend = await definition.connect(config, deps);
          return {
            name: backend.name,
            create: () => backend.create(config),
            revoke: (credentialId) => backend.revoke(credentialId),
            close: async () => {
              await backend.close?.();
            },
          };
        },
      };
    },
  };
}

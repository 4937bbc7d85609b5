import type { ProviderJob } from '@credential-providers/core';
import { artifactoryTokenJob } from '@credential-providers/provider-artifactory-token';
import { certificateJob } from '@credential-providers/provider-certificate';
import { iamApiKeyJob } from '@credential-providers/provider-iam-apikey';
import { postgresRoleJob } from '@credential-providers/provider-postgres-role';
import { slackOAuthJob } from '@credential-providers/provider-slack-oauth';

/**
 * Provider jobs addressable by name from the command line.
 * @public
 */
export class ProviderRegistry {
  private jobs = new Map<string, ProviderJob>();

  /**
   * Adds a job, replacing any job registered under the same name.
   */
  public register(job: ProviderJob): this {
    this.jobs.set(job.name, job);
    return this;
  }

  public get(name: string): ProviderJob | undefined {
    return this.jobs.get(name);
  }

  public getAllNames(): string[] {
    return Array.from(this.jobs.keys()).sort();
  }

  public list(): ProviderJob[] {
    return this.getAllNames().flatMap((name) => this.jobs.get(name) ?? []);
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register(iamApiKeyJob)
    .register(artifactoryTokenJob)
    .register(slackOAuthJob)
    .register(postgresRoleJob)
    .register(certificateJob);
}

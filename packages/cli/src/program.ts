import { Command } from 'commander';
import chalk, { type ChalkInstance } from 'chalk';
import {
  exitCodeFor,
  runJob,
  type Environment,
  type ProviderJob,
} from '@credential-providers/core';
import type { ParameterDeclaration } from '@credential-providers/models';
import type { ProviderRegistry } from './registry.js';

export interface ProgramOptions {
  registry: ProviderRegistry;
  env: Environment;
  /** Receives one line of standard output */
  write: (line: string) => void;
  /** Receives one line of error output */
  writeError: (line: string) => void;
  setExitCode: (code: number) => void;
  colors?: ChalkInstance;
  run?: typeof runJob;
}

function describeParameter(declaration: ParameterDeclaration): string {
  const { type } = declaration;
  const typeName = type.kind === 'enum' ? `enum[${type.options.join('|')}]` : type.kind;
  const source =
    declaration.direction === 'input' ? `from ${declaration.key}` : `as payload key ${declaration.key}`;
  return `${declaration.name} (${typeName}${declaration.required ? ', required' : ''}) ${source}`;
}

function formatJob(job: ProviderJob, colors: ChalkInstance): string[] {
  return [
    `${colors.bold(job.name)}  ${job.description}`,
    ...job.declarations.map((declaration) => `    ${colors.dim(describeParameter(declaration))}`),
  ];
}

/**
 * Builds the `credentials-provider` command.
 *
 * `run <provider>` executes one job action and sets the exit code from its
 * outcome; `list` prints the registered providers and their parameters.
 */
export function createProgram(options: ProgramOptions): Command {
  const colors = options.colors ?? chalk;
  const run = options.run ?? runJob;
  const program = new Command();

  program
    .name('credentials-provider')
    .description('Creates, reports and revokes credentials for a secrets orchestrator task')
    .showHelpAfterError();

  program
    .command('run <provider>')
    .description('Run the action named by SM_ACTION for one provider')
    .option('--log-level <level>', 'log level, overrides LOG_LEVEL')
    .action(async (providerName: string, flags: { logLevel?: string }) => {
      const job = options.registry.get(providerName);
      if (!job) {
        options.writeError(
          colors.red(
            `unknown provider '${providerName}'; available: ${options.registry.getAllNames().join(', ')}`,
          ),
        );
        options.setExitCode(1);
        return;
      }

      const env = flags.logLevel ? { ...options.env, LOG_LEVEL: flags.logLevel } : options.env;
      const outcome = await run({ job, env });
      if (outcome.status === 'failed') {
        options.writeError(colors.red(`${job.name}: ${outcome.code}: ${outcome.description}`));
      }
      options.setExitCode(exitCodeFor(outcome));
    });

  program
    .command('list')
    .description('List the registered providers and their parameters')
    .action(() => {
      for (const job of options.registry.list()) {
        for (const line of formatJob(job, colors)) {
          options.write(line);
        }
      }
    });

  return program;
}

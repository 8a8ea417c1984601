import { loadToolConfig } from '../lib/config';
import type { DeviceTransport } from '../lib/deploy/types';
import { UsageError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { USAGE } from './args';
import { runDeploy } from './deploy';
import { runGenerate } from './generate';
import { runValidate } from './validate';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  transport?: DeviceTransport;
}

/** Dispatches a subcommand and maps failures to exit codes (1 failure, 2 usage). */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const [command, ...rest] = argv;
  const config = loadToolConfig(deps.env ?? process.env);
  logger.setLogLevel(rest.includes('--verbose') ? 'debug' : config.logLevel);
  const args = rest.filter(arg => arg !== '--verbose');

  try {
    switch (command) {
      case 'generate':
        return await runGenerate(args);
      case 'validate':
        return await runValidate(args);
      case 'deploy':
        return await runDeploy(args, { config, transport: deps.transport });
      case 'help':
      case '--help':
      case '-h':
        console.log(USAGE);
        return 0;
      case undefined:
        throw new UsageError('No command given');
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error('CLI', error.message);
      console.error(USAGE);
      return 2;
    }
    logger.error('CLI', errorMessage(error));
    return 1;
  }
}

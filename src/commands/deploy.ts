import { parseArgs } from 'util';
import type { ToolConfig } from '../lib/config';
import { deploy } from '../lib/deploy/deployer';
import { SshTransport } from '../lib/deploy/ssh';
import type { DeviceTransport } from '../lib/deploy/types';
import { loadDeviceModel, loadGeneratedConfig } from '../lib/device/loader';
import { UsageError } from '../lib/errors';
import { logger } from '../lib/logger';
import { formatReport, isValid, validateDevice } from '../lib/validator';
import { withUsage } from './args';

const RULE = '-'.repeat(50);

export interface DeployCommandDeps {
  config: ToolConfig;
  transport?: DeviceTransport;
}

export async function runDeploy(args: string[], deps: DeployCommandDeps): Promise<number> {
  const { values, positionals } = withUsage(() =>
    parseArgs({
      args,
      allowPositionals: true,
      options: {
        'dry-run': { type: 'boolean' },
        'skip-validation': { type: 'boolean' },
      },
    }),
  );

  if (positionals.length !== 2) {
    throw new UsageError('deploy needs a device file and a generated configuration file');
  }
  const [configFile, generatedFile] = positionals;
  const dryRun = values['dry-run'] ?? false;

  const model = await loadDeviceModel(configFile);
  const cliText = await loadGeneratedConfig(generatedFile);

  if (!values['skip-validation']) {
    const report = validateDevice(model);
    if (!isValid(report)) {
      console.log(`\n${formatReport(report, configFile)}`);
      logger.error('Deployer', `Refusing to deploy ${configFile}: validation failed`);
      return 1;
    }
  }

  const transport = deps.transport ?? new SshTransport(deps.config.ssh);
  const result = await deploy({
    model,
    cliText,
    dryRun,
    transport,
    overrides: deps.config.credentials,
    port: deps.config.ssh.port,
  });

  if (result.dryRun) {
    console.log('\n[DRY RUN] Would deploy the following configuration:');
    console.log(RULE);
    console.log(cliText);
    console.log(RULE);
  } else if (result.output) {
    console.log('\nDevice output:');
    console.log(result.output);
  }

  return result.success ? 0 : 1;
}

import { parseArgs } from 'util';
import { loadDeviceModel } from '../lib/device/loader';
import { UsageError } from '../lib/errors';
import { logger } from '../lib/logger';
import { formatReport, isValid, validateDevice } from '../lib/validator';
import { withUsage } from './args';

export async function runValidate(args: string[]): Promise<number> {
  const { positionals } = withUsage(() => parseArgs({ args, allowPositionals: true, options: {} }));

  if (positionals.length === 0) {
    throw new UsageError('validate needs at least one device file');
  }

  let failed = 0;
  for (const input of positionals) {
    const model = await loadDeviceModel(input);
    const report = validateDevice(model);
    console.log(`\n${formatReport(report, input)}`);
    if (!isValid(report)) failed++;
  }

  if (positionals.length > 1) {
    logger.info('Validator', `${positionals.length - failed}/${positionals.length} file(s) passed`);
  }
  return failed > 0 ? 1 : 0;
}

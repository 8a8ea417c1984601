import path from 'path';
import { parseArgs } from 'util';
import { loadDeviceModel } from '../lib/device/loader';
import { UsageError } from '../lib/errors';
import { generateConfig, writeGeneratedConfig } from '../lib/generator/ios';
import { logger } from '../lib/logger';
import { withUsage } from './args';

const YAML_EXTENSION = /\.ya?ml$/i;

export function defaultOutputPath(inputPath: string, outDir?: string): string {
  const base = YAML_EXTENSION.test(inputPath) ? inputPath.replace(YAML_EXTENSION, '') : inputPath;
  const target = `${base}.cfg`;
  return outDir ? path.join(outDir, path.basename(target)) : target;
}

export async function runGenerate(args: string[]): Promise<number> {
  const { values, positionals } = withUsage(() =>
    parseArgs({
      args,
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        'out-dir': { type: 'string' },
        quiet: { type: 'boolean', short: 'q' },
      },
    }),
  );

  if (positionals.length === 0) {
    throw new UsageError('generate needs at least one device file');
  }
  if (values.output && positionals.length > 1) {
    throw new UsageError('--output only works with a single device file; use --out-dir');
  }

  for (const input of positionals) {
    logger.info('Generator', `Generating config for ${input}`);
    const model = await loadDeviceModel(input);
    const config = generateConfig(model);
    const outputPath = values.output ?? defaultOutputPath(input, values['out-dir']);
    await writeGeneratedConfig(outputPath, config);

    if (!values.quiet) {
      console.log('\n--- Generated Configuration ---');
      console.log(config);
    }
  }
  return 0;
}

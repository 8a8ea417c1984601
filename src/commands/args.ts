import { UsageError, errorMessage } from '../lib/errors';

/** Runs an argument parser, reporting bad flags as a UsageError. */
export function withUsage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export const USAGE = `Usage:
  netcfg generate <device.yaml...> [-o <out.cfg>] [--out-dir <dir>] [--quiet]
  netcfg validate <device.yaml...>
  netcfg deploy <device.yaml> <generated.cfg> [--dry-run] [--skip-validation]

Global options:
  --verbose   Debug logging`;

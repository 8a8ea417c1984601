import type { CredentialOverrides } from '../config';
import type { DeviceInfo, DeviceModel } from '../device/types';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { buildConnectionParams, resolveCredentials, type ResolvedCredentials } from './credentials';
import type { DeployResult, DeviceSession, DeviceTransport } from './types';

export interface DeployRequest {
  model: DeviceModel;
  cliText: string;
  dryRun: boolean;
  transport: DeviceTransport;
  overrides: CredentialOverrides;
  port: number;
}

/** Splits CLI text into the lines sent to the device, dropping blank ones. */
export function toCommandLines(cliText: string): string[] {
  return cliText
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line.trim() !== '');
}

/**
 * Opens a session to the device. Timeouts, authentication and connection
 * failures are fatal and propagate to the caller.
 */
export async function connect(
  device: DeviceInfo,
  credentials: ResolvedCredentials,
  transport: DeviceTransport,
  options: { port: number },
): Promise<DeviceSession> {
  try {
    const params = buildConnectionParams(device, credentials, options);
    const session = await transport.connect(params);
    logger.info('Deployer', `✓ Connected to ${device.hostname ?? params.host} (${params.host})`);
    return session;
  } catch (error) {
    logger.error('Deployer', `✗ ${errorMessage(error)}`);
    throw error;
  }
}

export async function verifyConnection(session: DeviceSession, device: DeviceInfo): Promise<boolean> {
  try {
    const version = await session.sendCommand('show version');
    logger.info('Deployer', `Device ${device.hostname ?? session.host} responded to show version`);
    logger.debug('Deployer', version);
    return true;
  } catch (error) {
    logger.warn('Deployer', `✗ Verification failed: ${errorMessage(error)}`);
    return false;
  }
}

export async function send(session: DeviceSession, cliText: string, dryRun: boolean): Promise<DeployResult> {
  const commands = toCommandLines(cliText);

  if (dryRun) {
    logger.info('Deployer', `[DRY RUN] ${commands.length} line(s) would be sent to ${session.host}`);
    return { success: true, dryRun: true, commands };
  }

  try {
    if (!session.isEnableMode()) {
      await session.enable();
    }

    const result = await session.sendConfigSet(commands);
    logger.info('Deployer', '✓ Configuration deployed successfully');
    if (result.rejected.length > 0) {
      logger.warn('Deployer', `${result.rejected.length} line(s) rejected by ${session.host}`);
    }

    const saved = await session.saveConfig();
    logger.info('Deployer', '✓ Configuration saved to device');
    logger.debug('Deployer', saved);

    return { success: true, dryRun: false, commands, output: result.output, rejected: result.rejected };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Deployer', `✗ Deployment failed: ${message}`);
    return { success: false, dryRun: false, commands, error: message };
  }
}

export async function disconnect(session: DeviceSession): Promise<void> {
  try {
    await session.close();
    logger.info('Deployer', '✓ Disconnected from device');
  } catch (error) {
    logger.warn('Deployer', `Error while disconnecting from ${session.host}: ${errorMessage(error)}`);
  }
}

/**
 * Connect, verify, send, and always disconnect once a session exists.
 * A dry run still connects so reachability and credentials are checked.
 */
export async function deploy(request: DeployRequest): Promise<DeployResult> {
  const { model, cliText, dryRun, transport, overrides, port } = request;
  if (dryRun) {
    logger.info('Deployer', '[DRY RUN MODE - No changes will be made]');
  }

  const credentials = resolveCredentials(model.device, overrides);
  const session = await connect(model.device, credentials, transport, { port });
  try {
    await verifyConnection(session, model.device);
    return await send(session, cliText, dryRun);
  } finally {
    await disconnect(session);
  }
}

import type { CredentialOverrides } from '../config';
import { DEFAULT_DEVICE_TYPE, type DeviceInfo } from '../device/types';
import { DeviceConnectionError } from '../errors';
import type { ConnectionParams } from './types';

export interface ResolvedCredentials {
  username?: string;
  password?: string;
  enableSecret: string;
}

/** Overrides (normally the environment) win over values in the device file. */
export function resolveCredentials(device: DeviceInfo, overrides: CredentialOverrides): ResolvedCredentials {
  return {
    username: overrides.username ?? device.credentials?.username,
    password: overrides.password ?? device.credentials?.password,
    enableSecret: overrides.enableSecret ?? device.credentials?.enableSecret ?? '',
  };
}

export function buildConnectionParams(
  device: DeviceInfo,
  credentials: ResolvedCredentials,
  options: { port: number },
): ConnectionParams {
  const host = device.ipAddress;
  if (!host) {
    throw new DeviceConnectionError('Device IP address is required to connect');
  }
  if (!credentials.username) {
    throw new DeviceConnectionError(`No username for ${host}; set NETWORK_USERNAME or device.credentials.username`);
  }
  if (!credentials.password) {
    throw new DeviceConnectionError(`No password for ${host}; set NETWORK_PASSWORD or device.credentials.password`);
  }

  return {
    deviceType: device.deviceType ?? DEFAULT_DEVICE_TYPE,
    host,
    port: options.port,
    username: credentials.username,
    password: credentials.password,
    secret: credentials.enableSecret,
  };
}

export * from './lib/device/types';
export { loadDeviceModel, loadGeneratedConfig, parseDeviceModel } from './lib/device/loader';
export { normalizeDeviceModel } from './lib/device/normalize';
export { generateConfig, writeGeneratedConfig } from './lib/generator/ios';
export { formatReport, isValid, validateDevice, type ValidationReport } from './lib/validator';
export { isValidIPv4 } from './lib/net/ipv4';
export { connect, deploy, disconnect, send, verifyConnection, type DeployRequest } from './lib/deploy/deployer';
export { buildConnectionParams, resolveCredentials } from './lib/deploy/credentials';
export { IosCliSession } from './lib/deploy/session';
export { SshTransport } from './lib/deploy/ssh';
export type { ConfigSetResult, ConnectionParams, DeployResult, DeviceSession, DeviceTransport, ShellChannel } from './lib/deploy/types';
export { loadToolConfig, DEFAULT_CONFIG, type ToolConfig } from './lib/config';
export * from './lib/errors';
export { logger } from './lib/logger';

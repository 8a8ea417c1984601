export type NetcfgErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE'
  | 'TIMEOUT'
  | 'AUTH_FAILURE'
  | 'CONNECTION'
  | 'DEPLOYMENT'
  | 'USAGE';

export class NetcfgError extends Error {
  constructor(public readonly code: NetcfgErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigNotFoundError extends NetcfgError {
  constructor(public readonly path: string) {
    super('CONFIG_NOT_FOUND', `Configuration file ${path} not found`);
  }
}

export class ConfigParseError extends NetcfgError {
  constructor(public readonly source: string, detail: string, options?: { cause?: unknown }) {
    super('CONFIG_PARSE', `Error parsing YAML in ${source}: ${detail}`, options);
  }
}

export class ConnectionTimeoutError extends NetcfgError {
  constructor(public readonly host: string, options?: { cause?: unknown }) {
    super('TIMEOUT', `Connection timeout to ${host}`, options);
  }
}

export class AuthenticationError extends NetcfgError {
  constructor(public readonly host: string, options?: { cause?: unknown }) {
    super('AUTH_FAILURE', `Authentication failed for ${host}`, options);
  }
}

export class DeviceConnectionError extends NetcfgError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
  }
}

export class DeploymentError extends NetcfgError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DEPLOYMENT', message, options);
  }
}

export class UsageError extends NetcfgError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

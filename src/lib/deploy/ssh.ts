import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import type { SshSettings } from '../config';
import {
  AuthenticationError,
  ConnectionTimeoutError,
  DeviceConnectionError,
  NetcfgError,
  errorMessage,
} from '../errors';
import { logger } from '../logger';
import { IosCliSession } from './session';
import type { ConnectionParams, DeviceSession, DeviceTransport, ShellChannel } from './types';

export const SUPPORTED_DEVICE_TYPES = ['cisco_ios', 'cisco_xe'];

type SshClientError = Error & { level?: string };

/** Maps an ssh2 client error onto the connection error taxonomy. */
export function classifySshError(err: SshClientError, host: string): NetcfgError {
  const message = err.message || '';
  if (err.level === 'client-timeout' || message.includes('Timed out') || message.includes('ETIMEDOUT')) {
    return new ConnectionTimeoutError(host, { cause: err });
  }
  if (err.level === 'client-authentication' || message.includes('All configured authentication methods failed')) {
    return new AuthenticationError(host, { cause: err });
  }
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) {
    return new DeviceConnectionError(`Cannot resolve host ${host}`, { cause: err });
  }
  if (message.includes('ECONNREFUSED')) {
    return new DeviceConnectionError(`Connection refused by ${host}. Check that SSH is enabled on the device.`, { cause: err });
  }
  return new DeviceConnectionError(`Connection error for ${host}: ${message}`, { cause: err });
}

function shellChannel(stream: ClientChannel, client: Client): ShellChannel {
  return {
    write: data => {
      stream.write(data);
    },
    onData: listener => {
      stream.on('data', (chunk: Buffer) => listener(chunk.toString('utf-8')));
      stream.stderr.on('data', (chunk: Buffer) => listener(chunk.toString('utf-8')));
    },
    onClose: listener => {
      stream.on('close', () => listener());
    },
    close: () => {
      stream.end();
      client.end();
    },
  };
}

function openShell(client: Client): Promise<ClientChannel> {
  return new Promise((resolve, reject) => {
    client.shell({ term: 'vt100', cols: 200, rows: 24 }, (err, stream) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stream);
    });
  });
}

export class SshTransport implements DeviceTransport {
  constructor(private readonly settings: SshSettings) {}

  async connect(params: ConnectionParams): Promise<DeviceSession> {
    if (!SUPPORTED_DEVICE_TYPES.includes(params.deviceType)) {
      throw new DeviceConnectionError(
        `Unsupported device type '${params.deviceType}' (supported: ${SUPPORTED_DEVICE_TYPES.join(', ')})`,
      );
    }

    const client = await this.openClient(params);
    try {
      const stream = await openShell(client);
      const session = new IosCliSession(shellChannel(stream, client), {
        host: params.host,
        secret: params.secret,
        commandTimeoutMs: this.settings.commandTimeoutMs,
      });
      await session.open();
      return session;
    } catch (error) {
      client.end();
      if (error instanceof NetcfgError) throw error;
      throw new DeviceConnectionError(`Failed to open CLI session on ${params.host}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private openClient(params: ConnectionParams): Promise<Client> {
    const config: ConnectConfig = {
      host: params.host,
      port: params.port,
      username: params.username,
      password: params.password,
      tryKeyboard: true,
      readyTimeout: this.settings.connectTimeoutMs,
    };

    return new Promise((resolve, reject) => {
      const conn = new Client();
      let resolved = false;

      // Guard in case the handshake never reports back
      const timeout = setTimeout(() => {
        if (!resolved) {
          resolved = true;
          logger.error('SSH', `Connection timeout for ${params.host}:${params.port}`);
          conn.end();
          reject(new ConnectionTimeoutError(params.host));
        }
      }, this.settings.connectTimeoutMs + 5000);

      conn.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => params.password));
      });

      conn.on('ready', () => {
        if (!resolved) {
          clearTimeout(timeout);
          resolved = true;
          logger.debug('SSH', `Handshake complete with ${params.host}:${params.port}`);
          resolve(conn);
        }
      });

      conn.on('error', (err) => {
        if (!resolved) {
          clearTimeout(timeout);
          resolved = true;
          logger.debug('SSH', `Client error for ${params.host}: ${err.message}`);
          conn.end();
          reject(classifySshError(err, params.host));
        }
      });

      logger.debug('SSH', `Connecting: host=${params.host}, port=${params.port}, user=${params.username}`);
      conn.connect(config);
    });
  }
}

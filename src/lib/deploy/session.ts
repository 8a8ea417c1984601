import { DeploymentError } from '../errors';
import { logger } from '../logger';
import type { ConfigSetResult, DeviceSession, ShellChannel } from './types';

// r1>  r1#  r1(config)#  r1(config-if)#
const PROMPT = /^[^\s#>()]+(?:\([^)]*\))?[>#]\s*$/;
const CONFIG_PROMPT = /\(config[^)]*\)#\s*$/;
const PASSWORD_PROMPT = /[Pp]assword:\s*$/;
const ENABLE_RESPONSE = new RegExp(`${PASSWORD_PROMPT.source}|${PROMPT.source}`);
const IOS_ERROR = /^\s*%\s*(Invalid input|Incomplete command|Ambiguous command|Unknown command)/;

export interface IosCliSessionOptions {
  host: string;
  secret: string;
  commandTimeoutMs: number;
}

interface Waiter {
  pattern: RegExp;
  context: string;
  resolve: (raw: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface Exchange {
  raw: string;
  output: string;
}

/**
 * Drives a Cisco IOS command line over a shell channel. Every command is
 * written, then the session waits until the last received line looks like a
 * prompt; the prompt tells which mode the device is in.
 */
export class IosCliSession implements DeviceSession {
  public readonly host: string;
  private buffer = '';
  private prompt = '';
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(private readonly channel: ShellChannel, private readonly options: IosCliSessionOptions) {
    this.host = options.host;
    channel.onData(chunk => this.handleData(chunk));
    channel.onClose(() => this.handleClose());
  }

  get currentPrompt(): string {
    return this.prompt;
  }

  async open(): Promise<void> {
    const raw = await this.readUntil(PROMPT, 'initial prompt');
    this.prompt = lastLine(raw);
    logger.debug('SSH', `Prompt on ${this.host}: ${this.prompt}`);
    await this.execute('terminal length 0');
  }

  isEnableMode(): boolean {
    return this.prompt.trimEnd().endsWith('#');
  }

  async enable(): Promise<void> {
    if (this.isEnableMode()) return;

    this.channel.write('enable\n');
    let raw = await this.readUntil(ENABLE_RESPONSE, 'enable');
    if (PASSWORD_PROMPT.test(lastLine(raw))) {
      if (!this.options.secret) {
        throw new DeploymentError(`${this.host} asked for an enable secret but none is configured`);
      }
      this.channel.write(`${this.options.secret}\n`);
      raw = await this.readUntil(ENABLE_RESPONSE, 'enable secret');
      if (PASSWORD_PROMPT.test(lastLine(raw))) {
        throw new DeploymentError(`Enable secret rejected by ${this.host}`);
      }
    }
    this.prompt = lastLine(raw);

    if (!this.isEnableMode()) {
      throw new DeploymentError(`Failed to enter enable mode on ${this.host}`);
    }
  }

  async sendConfigSet(commands: readonly string[]): Promise<ConfigSetResult> {
    const transcript: string[] = [];
    const rejected: string[] = [];

    transcript.push((await this.execute('configure terminal')).raw);
    if (!CONFIG_PROMPT.test(this.prompt)) {
      throw new DeploymentError(`Could not enter configuration mode on ${this.host}`);
    }

    for (const command of commands) {
      const exchange = await this.execute(command);
      transcript.push(exchange.raw);
      if (exchange.output.split('\n').some(line => IOS_ERROR.test(line))) {
        logger.warn('SSH', `${this.host} rejected: ${command}`);
        rejected.push(command);
      }
    }

    if (CONFIG_PROMPT.test(this.prompt)) {
      transcript.push((await this.execute('end')).raw);
    }

    return { output: transcript.join(''), rejected };
  }

  async saveConfig(): Promise<string> {
    return (await this.execute('write memory')).output;
  }

  async sendCommand(command: string): Promise<string> {
    return (await this.execute(command)).output;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.channel.close();
  }

  private async execute(command: string): Promise<Exchange> {
    this.channel.write(`${command}\n`);
    const raw = await this.readUntil(PROMPT, `"${command}"`);
    const lines = raw.split('\n');
    this.prompt = lines.pop() ?? '';
    if (lines.length > 0 && lines[0].trim() === command.trim()) {
      lines.shift();
    }
    return { raw, output: lines.join('\n').trimEnd() };
  }

  private handleData(chunk: string) {
    this.buffer += chunk.replace(/\r/g, '');
    this.settleWaiter();
  }

  private handleClose() {
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      clearTimeout(waiter.timer);
      this.waiter = null;
      waiter.reject(new DeploymentError(`Session to ${this.host} closed while waiting for ${waiter.context}`));
    }
  }

  private settleWaiter() {
    const waiter = this.waiter;
    if (!waiter || !waiter.pattern.test(lastLine(this.buffer))) return;

    clearTimeout(waiter.timer);
    this.waiter = null;
    const raw = this.buffer;
    this.buffer = '';
    waiter.resolve(raw);
  }

  private readUntil(pattern: RegExp, context: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new DeploymentError(`Session to ${this.host} is closed`));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new DeploymentError(`Timed out after ${this.options.commandTimeoutMs}ms waiting for ${context} on ${this.host}`));
      }, this.options.commandTimeoutMs);
      this.waiter = { pattern, context, resolve, reject, timer };
      // Output may already be buffered
      this.settleWaiter();
    });
  }
}

function lastLine(text: string): string {
  return text.slice(text.lastIndexOf('\n') + 1);
}

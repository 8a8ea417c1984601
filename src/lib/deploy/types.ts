export interface ConnectionParams {
  deviceType: string;
  host: string;
  port: number;
  username: string;
  password: string;
  secret: string;
}

/** Minimal byte-stream view of an interactive shell. */
export interface ShellChannel {
  write(data: string): void;
  onData(listener: (chunk: string) => void): void;
  onClose(listener: () => void): void;
  close(): void;
}

export interface ConfigSetResult {
  output: string;
  /** Lines the device answered with an IOS `%` error. */
  rejected: string[];
}

export interface DeviceSession {
  readonly host: string;
  isEnableMode(): boolean;
  /** Elevates to privileged EXEC using the secret given at connect time. */
  enable(): Promise<void>;
  sendConfigSet(commands: readonly string[]): Promise<ConfigSetResult>;
  saveConfig(): Promise<string>;
  sendCommand(command: string): Promise<string>;
  close(): Promise<void>;
}

export interface DeviceTransport {
  connect(params: ConnectionParams): Promise<DeviceSession>;
}

export interface DeployResult {
  success: boolean;
  dryRun: boolean;
  commands: string[];
  output?: string;
  rejected?: string[];
  error?: string;
}

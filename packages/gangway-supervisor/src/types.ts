/**
 * Supervisor types
 */

export enum HealthState {
  UNKNOWN = 'unknown',
  PENDING = 'pending',
  READY = 'ready',
  FAILED = 'failed',
  STOPPED = 'stopped'
}

export interface ListenAddress {
  host: string;
  port: number;
}

export interface HealthCheck {
  /** GET path probed for readiness */
  path: string;
  intervalMs: number;
  /** Per-probe request timeout */
  probeTimeoutMs: number;
}

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface ProcessHandle extends CommandSpec {
  name: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  listen: ListenAddress;
  health?: HealthCheck;
  /** Run to completion before launch; non-zero means the process cannot start */
  preflight?: CommandSpec;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be launched at all */
  error?: Error;
}

export interface ProcessStatus {
  name: string;
  state: HealthState;
  pid?: number;
  exit?: ProcessExit;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

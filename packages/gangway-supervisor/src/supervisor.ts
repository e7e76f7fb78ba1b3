/**
 * Process Supervisor
 * Backend first, readiness probe, then the router in the foreground.
 *
 * - The readiness probe is advisory: a backend that never turns healthy only
 *   produces a warning and the router starts anyway (degraded mode).
 * - A router that cannot start is fatal; the run ends non-zero.
 * - The run's exit code is the router's exit code.
 * - SIGTERM/SIGINT are forwarded to every child; the run resolves only after
 *   all of them have exited.
 */

import { constants } from 'os';
import { EventEmitter } from 'events';
import { SupervisorError } from './errors';
import { HealthProbe, healthUrl, httpHealthProbe } from './health';
import { LaunchedProcess, NodeProcessLauncher, ProcessLauncher } from './launcher';
import { consoleLogger } from './logger';
import { assertTransition, exitState } from './state';
import { HealthState, Logger, ProcessExit, ProcessHandle, ProcessStatus } from './types';

export interface SupervisorOptions {
  backend: ProcessHandle;
  router: ProcessHandle;
  /** Backend readiness window */
  readyTimeoutMs: number;
  /** Router readiness window; defaults to readyTimeoutMs */
  routerReadyTimeoutMs?: number;
  /** Grace period between the stop signal and SIGKILL */
  stopTimeoutMs?: number;
  launcher?: ProcessLauncher;
  probe?: HealthProbe;
  logger?: Logger;
  signalSource?: EventEmitter;
}

interface Launched {
  child: LaunchedProcess;
  exited: Promise<ProcessExit>;
}

interface Supervised {
  handle: ProcessHandle;
  state: HealthState;
  launched: Launched | null;
  exit: ProcessExit | null;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
const DEFAULT_STOP_TIMEOUT_MS = 10_000;

const SIGNAL_NUMBERS: { [name: string]: number | undefined } = { ...constants.signals };

export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
}

export function exitCodeOf(exit: ProcessExit): number {
  if (exit.code !== null) {
    return exit.code;
  }
  if (exit.signal) {
    return signalExitCode(exit.signal);
  }
  return 1;
}

export function describeExit(exit: ProcessExit): string {
  if (exit.error) {
    return `launch failed: ${exit.error.message}`;
  }
  return exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`;
}

function cancellableDelay(ms: number): { promise: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<void>(resolve => {
    timer = setTimeout(resolve, ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

export class Supervisor {
  private readonly backend: ProcessHandle;
  private readonly router: ProcessHandle;
  private readonly readyTimeoutMs: number;
  private readonly routerReadyTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly launcher: ProcessLauncher;
  private readonly probe: HealthProbe;
  private readonly logger: Logger;
  private readonly signalSource: EventEmitter;

  private entries = new Map<string, Supervised>();
  private transient = new Set<LaunchedProcess>();
  private running = false;
  private stopRequested: NodeJS.Signals | null = null;
  private stopping: Promise<void> | null = null;
  private readonly stopped: Promise<void>;
  private notifyStopped: () => void = () => undefined;

  constructor(options: SupervisorOptions) {
    if (options.backend.name === options.router.name) {
      throw new SupervisorError(`Backend and router share the name "${options.router.name}"`, 'UNKNOWN_HANDLE');
    }

    this.backend = options.backend;
    this.router = options.router;
    this.readyTimeoutMs = options.readyTimeoutMs;
    this.routerReadyTimeoutMs = options.routerReadyTimeoutMs ?? options.readyTimeoutMs;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger();
    this.launcher = options.launcher ?? new NodeProcessLauncher();
    this.probe = options.probe ?? httpHealthProbe;
    this.signalSource = options.signalSource ?? process;

    this.stopped = new Promise<void>(resolve => {
      this.notifyStopped = resolve;
    });

    for (const handle of [this.backend, this.router]) {
      this.entries.set(handle.name, { handle, state: HealthState.UNKNOWN, launched: null, exit: null });
    }
  }

  /**
   * Launch without waiting. Launch failures surface as FAILED, never as a throw.
   */
  start(handle: ProcessHandle): { pid?: number } {
    const entry = this.entry(handle);
    if (entry.state !== HealthState.UNKNOWN) {
      throw new SupervisorError(`${handle.name} was already started`, 'ALREADY_STARTED');
    }

    this.logger.info(`Starting ${handle.name}: ${[handle.command, ...handle.args].join(' ')}`);

    let child: LaunchedProcess;
    try {
      child = this.launcher.launch({
        name: handle.name,
        command: handle.command,
        args: handle.args,
        env: handle.env,
        cwd: handle.cwd
      });
    } catch (error) {
      const launchError = error instanceof Error ? error : new Error(String(error));
      entry.exit = { code: null, signal: null, error: launchError };
      this.setState(entry, HealthState.FAILED);
      this.logger.error(`${handle.name} could not be launched: ${launchError.message}`);
      return {};
    }

    this.setState(entry, HealthState.PENDING);
    entry.launched = {
      child,
      exited: child.exited.then(exit => {
        this.onExit(entry, exit);
        return exit;
      })
    };

    return { pid: child.pid };
  }

  /**
   * Poll the health endpoint until it answers 2xx, the process exits, a stop
   * is requested or the window elapses. Returns the state reached; a timeout
   * leaves the handle PENDING.
   */
  async awaitReady(handle: ProcessHandle, timeoutMs: number): Promise<HealthState> {
    const entry = this.entry(handle);
    const launched = entry.launched;
    if (!launched) {
      if (entry.state === HealthState.FAILED) {
        return entry.state;
      }
      throw new SupervisorError(`${handle.name} has not been started`, 'NOT_STARTED');
    }
    if (entry.state !== HealthState.PENDING) {
      return entry.state;
    }

    const check = handle.health;
    if (!check) {
      this.setState(entry, HealthState.READY);
      return entry.state;
    }

    const url = healthUrl(handle.listen, check);
    const deadline = Date.now() + timeoutMs;
    this.logger.info(`Waiting for ${handle.name} at ${url} (timeout ${timeoutMs}ms)...`);

    while (entry.state === HealthState.PENDING && !this.stopRequested) {
      const healthy = await this.probe(url, check.probeTimeoutMs);
      if (healthy && entry.state === HealthState.PENDING) {
        this.setState(entry, HealthState.READY);
        this.logger.info(`✅ ${handle.name} is ready`);
        break;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn(`${handle.name} not healthy after ${timeoutMs}ms; continuing without it`);
        break;
      }

      const delay = cancellableDelay(Math.min(check.intervalMs, remaining));
      try {
        await Promise.race([delay.promise, launched.exited, this.stopped]);
      } finally {
        delay.cancel();
      }
    }

    return entry.state;
  }

  /**
   * Full startup sequence. Resolves with the exit code the container should use.
   */
  async run(): Promise<number> {
    if (this.running) {
      throw new SupervisorError('Supervisor is already running', 'ALREADY_STARTED');
    }
    this.running = true;
    const detach = this.attachSignals();

    try {
      return await this.sequence();
    } finally {
      detach();
      this.running = false;
    }
  }

  /**
   * Forward `signal` to every live child, escalating to SIGKILL after the grace period.
   */
  shutdown(signal: NodeJS.Signals = 'SIGTERM'): Promise<void> {
    if (!this.stopRequested) {
      this.stopRequested = signal;
      this.notifyStopped();
    }
    if (!this.stopping) {
      this.stopping = this.stopAll(signal);
    }
    return this.stopping;
  }

  getState(handle: ProcessHandle): HealthState {
    return this.entry(handle).state;
  }

  status(): ProcessStatus[] {
    return [...this.entries.values()].map(entry => ({
      name: entry.handle.name,
      state: entry.state,
      pid: entry.launched?.child.pid,
      exit: entry.exit ?? undefined
    }));
  }

  private async sequence(): Promise<number> {
    this.start(this.backend);
    const backendState = await this.awaitReady(this.backend, this.readyTimeoutMs);

    if (this.stopRequested) {
      return this.finish(signalExitCode(this.stopRequested));
    }
    if (backendState !== HealthState.READY) {
      this.logger.warn(`${this.backend.name} is ${backendState}; starting ${this.router.name} in degraded mode`);
    }

    if (this.router.preflight) {
      const code = await this.runPreflight(this.router);
      if (this.stopRequested) {
        return this.finish(signalExitCode(this.stopRequested));
      }
      if (code !== 0) {
        this.logger.error(`${this.router.name} preflight failed with code ${code}`);
        return this.finish(code || 1);
      }
    }

    this.start(this.router);
    const routerEntry = this.entry(this.router);
    const routerState = await this.awaitReady(this.router, this.routerReadyTimeoutMs);

    if (routerState === HealthState.FAILED) {
      const code = routerEntry.exit ? exitCodeOf(routerEntry.exit) : 1;
      const reason = routerEntry.exit ? describeExit(routerEntry.exit) : 'unknown';
      this.logger.error(`${this.router.name} failed to start (${reason})`);
      return this.finish(code === 0 ? 1 : code);
    }

    const launched = routerEntry.launched;
    if (!launched) {
      return this.finish(1);
    }

    const exit = await launched.exited;
    return this.finish(exitCodeOf(exit));
  }

  private async finish(code: number): Promise<number> {
    await this.shutdown('SIGTERM');
    this.logger.info(`Exiting with code ${code}`);
    return code;
  }

  private async runPreflight(handle: ProcessHandle): Promise<number> {
    const preflight = handle.preflight;
    if (!preflight) {
      return 0;
    }

    this.logger.info(`Preflight for ${handle.name}: ${[preflight.command, ...preflight.args].join(' ')}`);

    let child: LaunchedProcess;
    try {
      child = this.launcher.launch({
        name: `${handle.name}:preflight`,
        command: preflight.command,
        args: preflight.args,
        env: handle.env,
        cwd: handle.cwd
      });
    } catch (error) {
      this.logger.error(`Preflight could not be launched: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }

    this.transient.add(child);
    try {
      return exitCodeOf(await child.exited);
    } finally {
      this.transient.delete(child);
    }
  }

  private onExit(entry: Supervised, exit: ProcessExit): void {
    entry.exit = exit;
    this.setState(entry, exitState(entry.state, this.stopRequested !== null));

    const name = entry.handle.name;
    if (this.stopRequested) {
      this.logger.info(`${name} exited (${describeExit(exit)})`);
    } else if (entry.handle === this.router) {
      this.logger.warn(`${name} exited (${describeExit(exit)})`);
    } else if (this.entry(this.router).state !== HealthState.UNKNOWN) {
      this.logger.warn(`${name} exited unexpectedly (${describeExit(exit)}); ${this.router.name} keeps serving`);
    } else {
      this.logger.warn(`${name} exited before ${this.router.name} started (${describeExit(exit)})`);
    }
  }

  private async stopAll(signal: NodeJS.Signals): Promise<void> {
    const live: Array<{ name: string; launched: Launched }> = [];
    for (const entry of this.entries.values()) {
      if (entry.launched && !entry.exit) {
        live.push({ name: entry.handle.name, launched: entry.launched });
      }
    }
    for (const child of this.transient) {
      live.push({ name: 'preflight', launched: { child, exited: child.exited } });
    }

    await Promise.all(live.map(({ name, launched }) => this.stopProcess(name, launched, signal)));
  }

  private async stopProcess(name: string, launched: Launched, signal: NodeJS.Signals): Promise<void> {
    this.logger.info(`Stopping ${name} (${signal})...`);
    launched.child.kill(signal);

    const grace = cancellableDelay(this.stopTimeoutMs);
    const outcome = await Promise.race([
      launched.exited.then(() => 'exited' as const),
      grace.promise.then(() => 'timeout' as const)
    ]);
    grace.cancel();

    if (outcome === 'timeout') {
      this.logger.warn(`${name} still running after ${this.stopTimeoutMs}ms; sending SIGKILL`);
      launched.child.kill('SIGKILL');
      await launched.exited;
    }
  }

  private attachSignals(): () => void {
    const listeners = FORWARDED_SIGNALS.map(signal => {
      const listener = () => this.handleSignal(signal);
      this.signalSource.on(signal, listener);
      return { signal, listener };
    });

    return () => {
      for (const { signal, listener } of listeners) {
        this.signalSource.removeListener(signal, listener);
      }
    };
  }

  private handleSignal(signal: NodeJS.Signals): void {
    if (this.stopRequested) {
      this.logger.warn(`Received ${signal} again; killing children`);
      for (const entry of this.entries.values()) {
        if (entry.launched && !entry.exit) {
          entry.launched.child.kill('SIGKILL');
        }
      }
      return;
    }

    this.logger.info(`Received ${signal}; stopping children...`);
    this.shutdown(signal).catch(error => {
      this.logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
    });
  }

  private setState(entry: Supervised, next: HealthState): void {
    entry.state = assertTransition(entry.handle.name, entry.state, next);
  }

  private entry(handle: ProcessHandle): Supervised {
    const entry = this.entries.get(handle.name);
    if (!entry) {
      throw new SupervisorError(`Unknown process handle "${handle.name}"`, 'UNKNOWN_HANDLE');
    }
    return entry;
  }
}

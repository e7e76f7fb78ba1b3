import { LaunchedProcess, LaunchSpec, ProcessLauncher } from '../launcher';
import { Logger, ProcessExit } from '../types';

export class FakeProcess implements LaunchedProcess {
  readonly exited: Promise<ProcessExit>;
  readonly signals: NodeJS.Signals[] = [];
  private resolveExit: (exit: ProcessExit) => void = () => undefined;
  private done = false;

  constructor(readonly spec: LaunchSpec, readonly pid: number, private exitOnSignal = true) {
    this.exited = new Promise(resolve => {
      this.resolveExit = resolve;
    });
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (this.exitOnSignal || signal === 'SIGKILL') {
      this.settle({ code: null, signal });
    }
  }

  finish(code: number): void {
    this.settle({ code, signal: null });
  }

  private settle(exit: ProcessExit): void {
    if (!this.done) {
      this.done = true;
      this.resolveExit(exit);
    }
  }
}

/**
 * Records every launch; `onLaunch` lets a test script the new process
 */
export class FakeLauncher implements ProcessLauncher {
  readonly launched: FakeProcess[] = [];
  private nextPid = 1000;

  constructor(
    private onLaunch: (child: FakeProcess) => void = () => undefined,
    private exitOnSignal = true
  ) {}

  launch(spec: LaunchSpec): FakeProcess {
    const child = new FakeProcess(spec, this.nextPid++, this.exitOnSignal);
    this.launched.push(child);
    this.onLaunch(child);
    return child;
  }

  byName(name: string): FakeProcess | undefined {
    return this.launched.find(child => child.spec.name === name);
  }
}

export function silentLogger(): Logger & { info: jest.Mock; warn: jest.Mock; error: jest.Mock } {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export function messages(mock: jest.Mock): string[] {
  return mock.mock.calls.map(call => String(call[0]));
}

export function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  return new Promise((resolve, reject) => {
    const tick = () => {
      if (predicate()) {
        resolve();
      } else if (Date.now() > deadline) {
        reject(new Error('condition not met in time'));
      } else {
        setTimeout(tick, 5);
      }
    };
    tick();
  });
}

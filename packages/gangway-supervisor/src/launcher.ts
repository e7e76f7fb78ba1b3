/**
 * Process launching
 * The Supervisor only sees LaunchedProcess; spawning lives behind ProcessLauncher.
 */

import { spawn, ChildProcess } from 'child_process';
import * as readline from 'readline';
import { Readable } from 'stream';
import { consoleLogger } from './logger';
import { CommandSpec, Logger, ProcessExit } from './types';

export interface LaunchSpec extends CommandSpec {
  name: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LaunchedProcess {
  readonly pid?: number;
  /** Resolves once, on exit or launch failure; never rejects */
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec): LaunchedProcess;
}

function relayLines(stream: Readable | null, write: (line: string) => void): void {
  if (!stream) {
    return;
  }
  readline.createInterface({ input: stream }).on('line', line => {
    if (line.trim()) {
      write(line);
    }
  });
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * Spawns real OS processes; stdout and stderr are relayed line by line under `[name]`.
 */
export class NodeProcessLauncher implements ProcessLauncher {
  constructor(private createLogger: (tag: string) => Logger = consoleLogger) {}

  launch(spec: LaunchSpec): LaunchedProcess {
    const logger = this.createLogger(`[${spec.name}]`);

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'pipe', 'pipe']
    });

    // Servers log routine lines to stderr (uvicorn, nginx error_log); both streams relay as info
    relayLines(child.stdout, line => logger.info(line));
    relayLines(child.stderr, line => logger.info(line));

    const exited = new Promise<ProcessExit>(resolve => {
      child.once('exit', (code, signal) => resolve({ code, signal }));
      child.on('error', error => {
        // Without a pid the process never started; later errors are kill failures
        if (child.pid === undefined) {
          resolve({ code: null, signal: null, error });
        } else {
          logger.error(`process error: ${error.message}`);
        }
      });
    });

    return {
      pid: child.pid,
      exited,
      kill: (signal) => {
        if (isRunning(child)) {
          child.kill(signal);
        }
      }
    };
  }
}

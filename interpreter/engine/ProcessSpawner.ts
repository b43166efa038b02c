import { spawn } from 'child_process';
import { constants } from 'os';
import { ExitCode } from '@core/constants/exit-codes';

export interface SpawnRequest {
  file: string;
  /** Whole argument vector; `argv[0]` is what the child sees as its own name */
  argv: string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ProcessOutcome {
  exitCode: number;
  /** Set when the child was terminated by a signal */
  signal?: NodeJS.Signals;
}

/**
 * Runs one child process to completion. Rejects only when the process could not be started.
 */
export interface ProcessSpawner {
  run(request: SpawnRequest): Promise<ProcessOutcome>;
}

/**
 * Shell convention for a child killed by a signal: 128 plus the signal number
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') {
      return ExitCode.SignalBase + value;
    }
  }
  return ExitCode.SignalBase;
}

/**
 * Spawns with inherited stdio so the interpreter talks to the user's terminal directly.
 */
export class ChildProcessSpawner implements ProcessSpawner {
  run(request: SpawnRequest): Promise<ProcessOutcome> {
    const [argv0, ...args] = request.argv;

    return new Promise((resolve, reject) => {
      let settled = false;

      const child = spawn(request.file, args, {
        argv0,
        cwd: request.cwd,
        env: request.env,
        stdio: 'inherit'
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        reject(error);
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        if (signal) {
          resolve({ exitCode: signalExitCode(signal), signal });
        } else {
          resolve({ exitCode: code ?? ExitCode.Failure });
        }
      });
    });
  }
}

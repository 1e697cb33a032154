/**
 * Piped Runner
 * 
 * Runs one ffmpeg process with machine-readable progress on stdout,
 * renders a single rewritten progress line, and collects stderr so the
 * caller can show the engine's own error text on failure.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createLogger, formatCommandLine } from '@encodeq/utils';
import { errorMessage } from '@encodeq/core';
import { ProgressTracker, renderProgressLine } from './progressParser.js';

const log = createLogger({ component: 'piped-runner' });

export const PROGRESS_ARGS: readonly string[] = ['-progress', 'pipe:1', '-nostats', '-v', 'error'];

export interface RunOutcome {
  success: boolean;
  /** Null when the process never started or died on a signal */
  exitCode: number | null;
  /** Everything the engine wrote to stderr, verbatim */
  diagnostics: string;
  /** The user pressed Ctrl+C while the process ran */
  interrupted: boolean;
  elapsedSeconds: number;
}

/**
 * Anything that can run one engine invocation to completion
 */
export interface EncodeRunner {
  run(args: readonly string[], totalDurationSeconds: number): Promise<RunOutcome>;
}

/** Where the progress line is drawn */
export interface ProgressSink {
  write(chunk: string): unknown;
}

/**
 * The parts of a child process the runner uses
 */
export interface EngineProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type EngineSpawner = (command: string, args: string[]) => EngineProcess;

const spawnEngine: EngineSpawner = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Where Ctrl+C is heard; the process itself unless told otherwise
 */
export interface InterruptSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export interface PipedRunnerOptions {
  ffmpegPath?: string;
  spawn?: EngineSpawner;
  interrupts?: InterruptSource;
  output?: ProgressSink;
  now?: () => number;
}

export class PipedRunner implements EncodeRunner {
  private ffmpegPath: string;
  private spawn: EngineSpawner;
  private interrupts: InterruptSource;
  private output: ProgressSink;
  private now: () => number;

  constructor(options: PipedRunnerOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.spawn = options.spawn ?? spawnEngine;
    this.interrupts = options.interrupts ?? process;
    this.output = options.output ?? process.stdout;
    this.now = options.now ?? Date.now;
  }

  run(args: readonly string[], totalDurationSeconds: number): Promise<RunOutcome> {
    const fullArgs = [...args, ...PROGRESS_ARGS];
    const startedAt = this.now();
    const elapsed = (): number => (this.now() - startedAt) / 1000;

    log.debug({ command: formatCommandLine(this.ffmpegPath, fullArgs) }, 'Starting engine');

    const tracker = new ProgressTracker(totalDurationSeconds, this.now);
    let drewProgress = false;
    tracker.on('progress', snapshot => {
      drewProgress = true;
      this.output.write(`\r${renderProgressLine(snapshot)}`);
    });

    return new Promise(resolve => {
      let child: EngineProcess;
      try {
        child = this.spawn(this.ffmpegPath, fullArgs);
      } catch (error) {
        resolve({ success: false, exitCode: null, diagnostics: errorMessage(error), interrupted: false, elapsedSeconds: 0 });
        return;
      }

      let diagnostics = '';
      let interrupted = false;
      let settled = false;

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        diagnostics += chunk;
      });

      if (child.stdout) {
        const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
        lines.on('line', line => {
          tracker.feed(line);
        });
      }

      // Ctrl+C goes to the child; partial output stays where it is
      const onInterrupt = (): void => {
        interrupted = true;
        child.kill('SIGINT');
      };
      this.interrupts.on('SIGINT', onInterrupt);

      const finish = (outcome: RunOutcome): void => {
        if (settled) return;
        settled = true;
        this.interrupts.off('SIGINT', onInterrupt);
        resolve(outcome);
      };

      child.on('error', error => {
        log.error({ err: error }, 'Engine could not be started');
        if (drewProgress) this.output.write('\n');
        finish({
          success: false,
          exitCode: null,
          diagnostics: diagnostics ? `${diagnostics}\n${error.message}` : error.message,
          interrupted,
          elapsedSeconds: elapsed(),
        });
      });

      child.on('close', code => {
        const success = code === 0 && !interrupted;
        if (success) {
          this.output.write(`\r${renderProgressLine(tracker.complete())}\n`);
        } else if (drewProgress) {
          this.output.write('\n');
        }

        log.debug({ exitCode: code, interrupted }, 'Engine exited');
        finish({ success, exitCode: code, diagnostics, interrupted, elapsedSeconds: elapsed() });
      });
    });
  }
}

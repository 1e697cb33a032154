/**
 * Progress Parser
 * 
 * Reads ffmpeg's `-progress pipe:1` key=value stream and turns each
 * `progress=` marker into a snapshot with percent, elapsed time and ETA.
 */

import { EventEmitter } from 'node:events';
import { formatClock } from '@encodeq/utils';

export interface ProgressSnapshot {
  /** Encoded media time so far */
  outTimeSeconds: number;
  /** 0-100 */
  percent: number;
  /** Wall time since the tracker started */
  elapsedSeconds: number;
  /** Undefined until some progress has been made */
  etaSeconds?: number;
  fps: number;
  speed: number;
  done: boolean;
}

export const BAR_WIDTH = 20;

/**
 * Percent of `totalSeconds` covered by `outTimeSeconds`, clamped to 0-100.
 * Unknown totals (<= 0) report 0.
 */
export function computePercent(outTimeSeconds: number, totalSeconds: number): number {
  if (totalSeconds <= 0 || !Number.isFinite(outTimeSeconds)) return 0;
  return Math.min(100, Math.max(0, (outTimeSeconds / totalSeconds) * 100));
}

/**
 * Constant-throughput extrapolation: elapsed * (100 - pct) / pct
 */
export function estimateEta(elapsedSeconds: number, percent: number): number | undefined {
  if (percent <= 0) return undefined;
  return (elapsedSeconds * (100 - percent)) / percent;
}

export function renderProgressBar(percent: number): string {
  const filled = Math.min(BAR_WIDTH, Math.max(0, Math.floor(percent / (100 / BAR_WIDTH))));
  return '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
}

/**
 * `[####................]  20.0% | Time: 00:01:02 | ETA: 00:04:08 | FPS:  48 | 2.01x`
 */
export function renderProgressLine(snapshot: ProgressSnapshot): string {
  const eta = snapshot.etaSeconds === undefined ? '--:--:--' : formatClock(snapshot.etaSeconds);
  return [
    `[${renderProgressBar(snapshot.percent)}] ${snapshot.percent.toFixed(1).padStart(5)}%`,
    `Time: ${formatClock(snapshot.elapsedSeconds)}`,
    `ETA: ${eta}`,
    `FPS: ${snapshot.fps.toFixed(0).padStart(3)}`,
    `${snapshot.speed.toFixed(2)}x`,
  ].join(' | ');
}

export class ProgressTracker extends EventEmitter {
  private totalSeconds: number;
  private now: () => number;
  private startedAt: number;

  // Latest values seen since the last marker
  private outTimeUs = 0;
  private fps = 0;
  private speed = 0;

  constructor(totalSeconds: number, now: () => number = Date.now) {
    super();
    this.totalSeconds = totalSeconds;
    this.now = now;
    this.startedAt = now();
  }

  /**
   * Feed one line of progress output. Emits 'progress' with a
   * ProgressSnapshot on every `progress=continue|end` marker.
   */
  feed(line: string): ProgressSnapshot | null {
    const separator = line.indexOf('=');
    if (separator <= 0) return null;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    switch (key) {
      case 'out_time_us': {
        // "N/A" until the first frame is written
        const us = parseInt(value, 10);
        if (Number.isFinite(us) && us >= 0) this.outTimeUs = us;
        return null;
      }
      case 'fps': {
        const fps = parseFloat(value);
        if (Number.isFinite(fps)) this.fps = fps;
        return null;
      }
      case 'speed': {
        const speed = parseFloat(value.replace('x', ''));
        if (Number.isFinite(speed)) this.speed = speed;
        return null;
      }
      case 'progress': {
        if (value !== 'continue' && value !== 'end') return null;
        const snapshot = this.snapshot(value === 'end');
        this.emit('progress', snapshot);
        return snapshot;
      }
      default:
        return null;
    }
  }

  /**
   * Snapshot at 100%, used once the process has exited cleanly
   */
  complete(): ProgressSnapshot {
    return {
      ...this.snapshot(true),
      percent: 100,
      etaSeconds: 0,
    };
  }

  private snapshot(done: boolean): ProgressSnapshot {
    const outTimeSeconds = this.outTimeUs / 1_000_000;
    const percent = computePercent(outTimeSeconds, this.totalSeconds);
    const elapsedSeconds = Math.max(0, (this.now() - this.startedAt) / 1000);

    return {
      outTimeSeconds,
      percent,
      elapsedSeconds,
      etaSeconds: estimateEta(elapsedSeconds, percent),
      fps: this.fps,
      speed: this.speed,
      done,
    };
  }
}

import { performance } from 'node:perf_hooks';

import { padLeft, fixed } from './format.js';

export interface TimeStamp {
  readonly name: string;
  readonly micros: number;
}

/**
 * Named stage timings of one detect call. Stage durations are the gaps
 * between consecutive stamps, starting from `startMicros`.
 */
export interface TimingProfile {
  readonly startMicros: number;
  readonly stamps: readonly TimeStamp[];
}

export interface TimeProfilerOptions {
  /** Clock in microseconds */
  now?: () => number;
}

const defaultNow = (): number => performance.now() * 1000;

export class TimeProfiler {
  private readonly now: () => number;
  private startMicros: number;
  private stamps: TimeStamp[] = [];

  constructor(options: TimeProfilerOptions = {}) {
    this.now = options.now ?? defaultNow;
    this.startMicros = this.now();
  }

  /** Clear all stamps and restart the clock */
  public clear(): void {
    this.stamps = [];
    this.startMicros = this.now();
  }

  public stamp(name: string): void {
    this.stamps.push({ name, micros: this.now() });
  }

  public snapshot(): TimingProfile {
    return { startMicros: this.startMicros, stamps: [...this.stamps] };
  }
}

export function profileTotalMicros(profile: TimingProfile): number {
  const last = profile.stamps[profile.stamps.length - 1];
  if (!last) return 0;
  return last.micros - profile.startMicros;
}

export interface StageTiming {
  name: string;
  stageMs: number;
  cumulativeMs: number;
}

export function profileStages(profile: TimingProfile): StageTiming[] {
  let previous = profile.startMicros;
  return profile.stamps.map((stamp) => {
    const stage: StageTiming = {
      name: stamp.name,
      stageMs: (stamp.micros - previous) / 1000,
      cumulativeMs: (stamp.micros - profile.startMicros) / 1000,
    };
    previous = stamp.micros;
    return stage;
  });
}

/**
 * One line per stamp: index, stage name, stage time and cumulative time.
 */
export function formatTimingProfile(profile: TimingProfile): string[] {
  return profileStages(profile).map(
    (stage, index) =>
      `${padLeft(index, 2)} ${padLeft(stage.name, 32)} ` +
      `${fixed(stage.stageMs, 15, 6)} ms ${fixed(stage.cumulativeMs, 15, 6)} ms`
  );
}

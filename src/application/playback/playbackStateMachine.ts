import { PlaybackState, type SignalledPlaybackState } from '@/domain/playback/playbackState';
import type { ClockPort } from '@/ports/ClockPort';
import type { SpeakerSwitchPort } from '@/ports/SpeakerSwitchPort';
import { WakeSignal } from '@/shared/async/wakeSignal';
import { describeError } from '@/shared/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_GRACE_PERIOD_MS = 60_000;

export interface PlaybackStateMachineOptions {
  clock: ClockPort;
  pollIntervalMs?: number;
  gracePeriodMs?: number;
  log?: ComponentLogger;
}

export interface PlaybackSnapshot {
  state: PlaybackState;
  changedAt: number | null;
}

/**
 * Sink for derived receiver states.
 */
export interface PlaybackSignalSink {
  signal(state: SignalledPlaybackState): void;
}

/**
 * Turns receiver playback signals into speaker power commands.
 *
 * `signal()` records the latest state and wakes the supervisory loop. The loop
 * re-evaluates on every wake and at least once per poll interval:
 * - playing: switch on (repeated as keep-alive)
 * - inactive: switch off
 * - stopped: switch off once the grace period has elapsed since the change
 *
 * Only the latest state is kept; states replaced before the loop wakes are
 * never acted on.
 */
export class PlaybackStateMachine implements PlaybackSignalSink {
  private state: PlaybackState = PlaybackState.Unknown;
  private changedAt: number | null = null;
  private readonly wake = new WakeSignal();
  private readonly clock: ClockPort;
  private readonly log: ComponentLogger;
  private running = false;
  private loop: Promise<void> | null = null;

  public readonly pollIntervalMs: number;
  public readonly gracePeriodMs: number;

  constructor(
    private readonly speakers: SpeakerSwitchPort,
    options: PlaybackStateMachineOptions,
  ) {
    this.clock = options.clock;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.log = options.log ?? createLogger('Supervisor');
  }

  /**
   * Records `next` and wakes the loop. Repeating the current state is a no-op
   * and leaves the change timestamp untouched.
   */
  public signal(next: SignalledPlaybackState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.changedAt = this.clock.now();
    this.wake.set();
    this.log.info('receiver state changed', { from: previous, to: next });
  }

  public signalPlaying(): void {
    this.signal(PlaybackState.Playing);
  }

  public signalStopped(): void {
    this.signal(PlaybackState.Stopped);
  }

  public signalInactive(): void {
    this.signal(PlaybackState.Inactive);
  }

  public getSnapshot(): PlaybackSnapshot {
    return { state: this.state, changedAt: this.changedAt };
  }

  /**
   * Milliseconds since the last state change. Before the first signal this
   * reports one second past the grace period.
   */
  public elapsedSinceChange(): number {
    if (this.changedAt === null) {
      return this.gracePeriodMs + 1000;
    }
    return this.clock.now() - this.changedAt;
  }

  /**
   * One supervisory pass over the current state.
   */
  public evaluate(): void {
    switch (this.state) {
      case PlaybackState.Playing:
        this.speakers.switchOn();
        return;
      case PlaybackState.Inactive:
        this.speakers.switchOff();
        return;
      case PlaybackState.Stopped:
      case PlaybackState.Unknown: {
        const elapsed = this.elapsedSinceChange();
        if (elapsed >= this.gracePeriodMs) {
          this.speakers.switchOff();
          return;
        }
        this.log.spam('within grace period', {
          elapsedMs: Math.round(elapsed),
          gracePeriodMs: this.gracePeriodMs,
        });
        return;
      }
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.loop = this.run();
  }

  /**
   * Ends the loop at its next wake and waits for it to exit.
   */
  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }
    this.running = false;
    this.wake.set();
    await loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    this.log.info('speaker supervisor started', {
      pollIntervalMs: this.pollIntervalMs,
      gracePeriodMs: this.gracePeriodMs,
    });
    while (this.running) {
      const woken = await this.wake.wait(this.pollIntervalMs);
      this.wake.clear();
      if (!this.running) {
        break;
      }
      this.log.spam('supervisor pass', { state: this.state, woken });
      try {
        this.evaluate();
      } catch (error) {
        this.log.error('supervisor pass failed', { message: describeError(error) });
      }
    }
    this.log.info('speaker supervisor stopped');
  }
}

/**
 * Logical playback state of the receiver as seen by the speaker supervisor.
 */
export enum PlaybackState {
  /** Pre-initialization sentinel; no signal has arrived yet. */
  Unknown = 'unknown',
  /** Media is actively rendering. */
  Playing = 'playing',
  /** A session exists but media is paused or idle. */
  Stopped = 'stopped',
  /** The receiver has no active session at all. */
  Inactive = 'inactive',
}

export type SignalledPlaybackState = Exclude<PlaybackState, PlaybackState.Unknown>;

export function powerStateLabel(on: boolean): 'on' | 'off' {
  return on ? 'on' : 'off';
}

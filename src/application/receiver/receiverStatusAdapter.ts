import type { PlaybackSignalSink } from '@/application/playback/playbackStateMachine';
import { PlaybackState, type SignalledPlaybackState } from '@/domain/playback/playbackState';
import type { ReceiverObserver, ReceiverStatusSource } from '@/ports/ReceiverPort';

/**
 * Collapses the receiver's media, cast and connection callbacks into one
 * playback signal. Every callback re-derives from the receiver's current
 * status; repeats are absorbed by the sink.
 */
export class ReceiverStatusAdapter implements ReceiverObserver {
  constructor(private readonly sink: PlaybackSignalSink) {}

  public static derive(receiver: ReceiverStatusSource): SignalledPlaybackState {
    if (!receiver.isActive()) {
      return PlaybackState.Inactive;
    }
    return receiver.isPlaying() ? PlaybackState.Playing : PlaybackState.Stopped;
  }

  public refresh(receiver: ReceiverStatusSource): void {
    this.sink.signal(ReceiverStatusAdapter.derive(receiver));
  }

  public onMediaStatus(receiver: ReceiverStatusSource): void {
    this.refresh(receiver);
  }

  public onCastStatus(receiver: ReceiverStatusSource): void {
    this.refresh(receiver);
  }

  public onConnectionStatus(receiver: ReceiverStatusSource): void {
    this.refresh(receiver);
  }
}

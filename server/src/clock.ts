import { rotationPosition } from '../../common/rotation';
import { SyncSnapshot } from '../../common/types';

export const DEFAULT_ITEM_DURATION = 10;

export interface PlaybackState {
  isPlaying: boolean;
  startTime: number | null;
  pauseElapsed: number | null;
  itemDuration: number;
}

/**
 * The single authoritative play/pause timer. While playing only startTime is
 * meaningful, while paused only pauseElapsed; the other is kept null so the
 * position is never re-derived from a stale value.
 *
 * Not synchronized on its own: the owner calls it under its lock.
 */
export class PlaybackClock {
  private current: PlaybackState;

  constructor(now: number, itemDuration = DEFAULT_ITEM_DURATION) {
    assertDuration(itemDuration);
    this.current = { isPlaying: true, startTime: now, pauseElapsed: null, itemDuration };
  }

  state(): Readonly<PlaybackState> {
    return { ...this.current };
  }

  get isPlaying(): boolean {
    return this.current.isPlaying;
  }

  get itemDuration(): number {
    return this.current.itemDuration;
  }

  snapshot(now: number, catalogLength: number): SyncSnapshot {
    const { isPlaying, startTime, pauseElapsed, itemDuration } = this.current;
    const raw = isPlaying ? now - (startTime ?? now) : pauseElapsed ?? 0;
    const { elapsed, index, remaining } = rotationPosition(raw, itemDuration, catalogLength);

    return {
      sentAt: now,
      serverTime: now,
      isPlaying,
      currentIndex: index,
      remaining,
      itemDuration,
      elapsed,
      startTime: isPlaying ? startTime : null,
      pauseElapsed: isPlaying ? null : pauseElapsed
    };
  }

  /** Flips play/pause without moving the rotation position. */
  toggle(now: number, catalogLength: number): Readonly<PlaybackState> {
    if (this.current.isPlaying) {
      const { elapsed } = this.snapshot(now, catalogLength);
      this.current = { ...this.current, isPlaying: false, startTime: null, pauseElapsed: elapsed };
    } else {
      const pauseElapsed = this.current.pauseElapsed ?? 0;
      this.current = { ...this.current, isPlaying: true, startTime: now - pauseElapsed, pauseElapsed: null };
    }
    return this.state();
  }

  setItemDuration(seconds: number): void {
    assertDuration(seconds);
    this.current = { ...this.current, itemDuration: seconds };
  }
}

function assertDuration(seconds: number): void {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new RangeError(`Item duration must be positive, got ${seconds}`);
  }
}

/**
 * Maps backend-relative time onto session media time.
 *
 * A connection only hears the audio it was sent, so paused stretches and
 * frames dropped while disconnected leave gaps. Each contiguous run of sent
 * frames is recorded as (stream offset, media offset).
 */

interface Run {
  streamStartMs: number;
  mediaStartMs: number;
}

export class StreamTimeline {
  private runs: Run[] = [];
  private streamEndMs = 0;
  private mediaEndMs: number | null = null;

  constructor(private readonly baseMediaMs: number) {}

  /** Record a frame handed to the connection */
  recordSent(mediaStartMs: number, durationMs: number): void {
    if (this.mediaEndMs === null || mediaStartMs !== this.mediaEndMs) {
      this.runs.push({ streamStartMs: this.streamEndMs, mediaStartMs });
    }
    this.streamEndMs += durationMs;
    this.mediaEndMs = mediaStartMs + durationMs;
  }

  toMedia(streamMs: number): number {
    let run: Run | undefined;
    for (const candidate of this.runs) {
      if (candidate.streamStartMs > streamMs) break;
      run = candidate;
    }

    if (!run) {
      return this.baseMediaMs + streamMs;
    }
    return run.mediaStartMs + (streamMs - run.streamStartMs);
  }

  get sentMs(): number {
    return this.streamEndMs;
  }
}

/**
 * Session statistics
 */

export type TrackOutcome =
  | { status: 'done'; trackId: string; path: string; bytes: number }
  | { status: 'skipped'; trackId: string; reason: 'archive' | 'exists'; path?: string }
  | { status: 'failed'; trackId: string; error: Error };

export interface StatsSnapshot {
  downloaded: number;
  skippedArchive: number;
  skippedExists: number;
  failed: number;
  bytes: number;
  albumsProcessed: string[];
}

export class SessionStats {
  private downloaded = 0;
  private skippedArchive = 0;
  private skippedExists = 0;
  private failed = 0;
  private bytes = 0;
  private readonly albums = new Set<string>();

  record(outcome: TrackOutcome): void {
    switch (outcome.status) {
      case 'done':
        this.downloaded += 1;
        this.bytes += outcome.bytes;
        break;
      case 'skipped':
        if (outcome.reason === 'archive') {
          this.skippedArchive += 1;
        } else {
          this.skippedExists += 1;
        }
        break;
      case 'failed':
        this.failed += 1;
        break;
    }
  }

  addSkippedArchive(count: number): void {
    this.skippedArchive += count;
  }

  addFailed(count: number): void {
    this.failed += count;
  }

  addProcessed(title: string): void {
    this.albums.add(title);
  }

  get totalProcessed(): number {
    return this.downloaded + this.skippedArchive + this.skippedExists + this.failed;
  }

  snapshot(): StatsSnapshot {
    return {
      downloaded: this.downloaded,
      skippedArchive: this.skippedArchive,
      skippedExists: this.skippedExists,
      failed: this.failed,
      bytes: this.bytes,
      albumsProcessed: [...this.albums],
    };
  }
}

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export interface AudioStoreOptions {
  storageDir: string;
  publicBaseUrl: string;
  /** Files older than this are removed by the sweeper. */
  retentionMs: number;
}

function sanitizeSegment(value: string): string {
  const sanitized = value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 48);
  return sanitized.length > 0 ? sanitized : 'unknown';
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Local directory of synthesized answer audio, served to the gateway from
 * publicBaseUrl.
 */
export class AudioStore {
  private cleanupTimer: NodeJS.Timeout | undefined;
  private cleanupInProgress = false;

  constructor(private readonly options: AudioStoreOptions) {}

  public async storeWav(sessionId: string, label: string, wavBuffer: Buffer): Promise<string> {
    const fileName = `${sanitizeSegment(sessionId)}_${sanitizeSegment(label)}_${randomUUID()}.wav`;
    const localPath = path.join(this.options.storageDir, fileName);

    await fs.mkdir(this.options.storageDir, { recursive: true });
    await fs.writeFile(localPath, wavBuffer);
    this.ensureCleanupScheduled();

    const trimmedBaseUrl = this.options.publicBaseUrl.replace(/\/$/, '');
    return `${trimmedBaseUrl}/${fileName}`;
  }

  /** Deletes expired files; resolves with the number removed. */
  public async sweep(now: number = Date.now()): Promise<number> {
    if (this.cleanupInProgress) {
      return 0;
    }

    this.cleanupInProgress = true;
    let deleted = 0;
    try {
      const entries = await fs.readdir(this.options.storageDir, { withFileTypes: true });
      for (const entry of entries) {
        if (!entry.isFile()) {
          continue;
        }

        const filePath = path.join(this.options.storageDir, entry.name);
        try {
          const stats = await fs.stat(filePath);
          if (now - stats.mtimeMs > this.options.retentionMs) {
            await fs.unlink(filePath);
            deleted += 1;
          }
        } catch (error) {
          log.warn({ err: error, filePath }, 'audio cleanup file error');
        }
      }

      if (deleted > 0) {
        log.info({ event: 'audio_cleanup_completed', deleted }, 'audio cleanup completed');
      }
    } catch (error) {
      if (!isMissingDirectory(error)) {
        log.error({ err: error, event: 'audio_cleanup_failed' }, 'audio cleanup failed');
      }
    } finally {
      this.cleanupInProgress = false;
    }
    return deleted;
  }

  public stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  private ensureCleanupScheduled(): void {
    if (this.cleanupTimer) {
      return;
    }

    this.cleanupTimer = setInterval(() => {
      void this.sweep();
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref?.();
  }
}

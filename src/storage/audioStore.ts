import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import type { AudioAsset, SaveAudioInput } from './types';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_AGE_HOURS = 24;

export interface AudioStoreOptions {
  dir: string;
  publicBaseUrl: string;
  maxAgeHours?: number;
}

function sanitizeSegment(value: string): string {
  const sanitized = value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 48);
  return sanitized.length > 0 ? sanitized : 'unknown';
}

function extensionFor(contentType: string): string {
  if (contentType.includes('mpeg') || contentType.includes('mp3')) return 'mp3';
  if (contentType.includes('ogg')) return 'ogg';
  return 'wav';
}

/** Synthesized audio on local disk, served back under a public URL. */
export class AudioStore {
  private readonly dir: string;
  private readonly publicBaseUrl: string;
  private readonly maxAgeMs: number;
  private cleanupTimer?: NodeJS.Timeout;
  private cleanupInProgress = false;

  constructor(options: AudioStoreOptions) {
    this.dir = options.dir;
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/$/, '');
    this.maxAgeMs = (options.maxAgeHours ?? DEFAULT_MAX_AGE_HOURS) * 60 * 60 * 1000;
  }

  public get directory(): string {
    return this.dir;
  }

  public async save(input: SaveAudioInput): Promise<AudioAsset> {
    const extension = input.extension ?? extensionFor(input.contentType ?? '');
    const prefix = input.label ? `${sanitizeSegment(input.label)}_` : '';
    const fileName = `${prefix}${randomUUID()}.${extension}`;
    const localPath = path.join(this.dir, fileName);

    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(localPath, input.data);
    this.ensureCleanupScheduled();

    return {
      id: fileName,
      fileName,
      localPath,
      publicUrl: `${this.publicBaseUrl}/${fileName}`,
    };
  }

  public async cleanupOldFiles(now: number = Date.now()): Promise<number> {
    if (this.cleanupInProgress) {
      return 0;
    }

    this.cleanupInProgress = true;
    let deleted = 0;
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true });

      for (const entry of entries) {
        if (!entry.isFile()) {
          continue;
        }

        const filePath = path.join(this.dir, entry.name);
        try {
          const stats = await fs.stat(filePath);
          if (now - stats.mtimeMs > this.maxAgeMs) {
            await fs.unlink(filePath);
            deleted += 1;
          }
        } catch (error) {
          log.warn({ event: 'audio_cleanup_file_error', err: error, file_path: filePath }, 'audio cleanup file error');
        }
      }

      if (deleted > 0) {
        log.info({ event: 'audio_cleanup_completed', deleted }, 'audio cleanup completed');
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        log.error({ event: 'audio_cleanup_failed', err: error }, 'audio cleanup failed');
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
      void this.cleanupOldFiles();
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref?.();
  }
}

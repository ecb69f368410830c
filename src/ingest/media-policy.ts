import { posix } from 'path';
import type { PlatformMedia, PlatformMessage } from '../api/types.js';
import type { MediaType } from '../storage/types.js';

export interface MediaPolicy {
  enabled: boolean;
  maxBytes: number;
}

const NEVER_DOWNLOADED: ReadonlySet<MediaType> = new Set<MediaType>(['video', 'voice', 'video_note']);

export function mediaPolicyFor(downloadMedia: boolean, maxMediaMb: number): MediaPolicy {
  return { enabled: downloadMedia, maxBytes: Math.floor(maxMediaMb * 1024 * 1024) };
}

/** Videos and voice notes are skipped; so is anything of unknown or excess size. */
export function shouldDownloadMedia(media: PlatformMedia | null, policy: MediaPolicy): boolean {
  if (!policy.enabled || !media) {
    return false;
  }
  if (NEVER_DOWNLOADED.has(media.type)) {
    return false;
  }
  return media.sizeBytes !== null && media.sizeBytes <= policy.maxBytes;
}

function sanitizeFilename(name: string): string {
  return name
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '-')
    .replace(/\s+/g, '_')
    .replace(/^\.+/, '');
}

/** Location of a downloaded payload, relative to the media directory. */
export function mediaPath(message: PlatformMessage): string {
  const dir = String(message.chatId);
  const name = message.media?.fileName ? sanitizeFilename(message.media.fileName) : '';
  if (name) {
    return posix.join(dir, `${message.id}_${name}`);
  }
  const ext = message.media?.extension;
  if (ext && /^\.[A-Za-z0-9]{1,10}$/.test(ext)) {
    return posix.join(dir, `${message.id}${ext}`);
  }
  return posix.join(dir, `${message.id}.bin`);
}

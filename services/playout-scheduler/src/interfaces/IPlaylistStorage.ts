import { SerializedPlaylistDocument } from '../models/PlaylistDocument';
import { UsageHistory } from '../models/UsageHistory';

/**
 * ffplayout program item: play `source` from `in` to `out` seconds
 */
export interface PlayoutProgramItem {
  in: number;
  out: number;
  duration: number;
  source: string;
}

export interface PlayoutProgram {
  channel: string;
  date: string;
  program: PlayoutProgramItem[];
}

export type StoredPlaylist = SerializedPlaylistDocument | PlayoutProgram;

/**
 * Playlist Storage Interface
 *
 * Single Responsibility: Persist generated playlists for the player
 */
export interface IPlaylistStorage {
  /**
   * Write the playlist for a broadcast date, returning the file it was written to
   */
  writePlaylist(date: string, playlist: StoredPlaylist): Promise<string>;

  /**
   * Read back a stored playlist, or null when none exists for the date
   */
  readPlaylist(date: string): Promise<StoredPlaylist | null>;
}

/**
 * Usage History Store Interface
 *
 * Single Responsibility: Carry rotation state from one run to the next
 */
export interface IUsageHistoryStore {
  load(): Promise<UsageHistory>;
  save(history: UsageHistory): Promise<void>;
}

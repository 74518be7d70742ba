import { PlayoutProgram, PlayoutProgramItem } from '../interfaces/IPlaylistStorage';
import { PlaylistDocument } from '../models/PlaylistDocument';

export interface IdentOptions {
  /** Absolute path of the station ident; no idents are inserted without it */
  identPath?: string;
  /** Insert the ident after this many regular items; 0 disables */
  everyN: number;
  durationSeconds: number;
}

/**
 * ffplayout Program Formatter
 *
 * Flattens a playlist document into the sequential program list ffplayout
 * plays, with the station ident between every N regular items.
 */
export class PlayoutProgramFormatter {
  format(document: PlaylistDocument, ident: IdentOptions): PlayoutProgram {
    const program: PlayoutProgramItem[] = [];
    const identPath = ident.everyN > 0 ? ident.identPath : undefined;
    let sinceIdent = 0;

    document.entries.forEach((entry, position) => {
      program.push(this.item(entry.mediaItem.filePath, entry.actualDurationSeconds));
      sinceIdent += 1;

      const isLast = position === document.entries.length - 1;
      if (identPath && sinceIdent >= ident.everyN && !isLast) {
        program.push(this.item(identPath, ident.durationSeconds));
        sinceIdent = 0;
      }
    });

    return {
      channel: document.channel,
      date: document.date,
      program,
    };
  }

  private item(source: string, durationSeconds: number): PlayoutProgramItem {
    return {
      in: 0,
      out: durationSeconds,
      duration: durationSeconds,
      source,
    };
  }
}

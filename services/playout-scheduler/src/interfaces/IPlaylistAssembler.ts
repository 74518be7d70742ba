import { MediaCatalog } from '../models/MediaCatalog';
import { PlaylistDocument } from '../models/PlaylistDocument';
import { ScheduleTemplate } from '../models/ScheduleTemplate';
import { UsageHistory } from '../models/UsageHistory';

/**
 * Playlist Assembler Interface
 *
 * Single Responsibility: Turn a template and a catalog into a playlist document
 */

export interface AssemblyOptions {
  channel: string;
  /** Broadcast date, YYYY-MM-DD */
  date: string;
  generatedAt?: Date;
  /** Rotation state; updated in place. A fresh history is used when omitted. */
  history?: UsageHistory;
}

export interface IPlaylistAssembler {
  /**
   * Fill every slot in template order. Slots without a candidate are
   * reported on the document; only structural failures throw.
   */
  assemble(template: ScheduleTemplate, catalog: MediaCatalog, options: AssemblyOptions): PlaylistDocument;
}

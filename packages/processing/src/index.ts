/**
 * @hiresdl/processing
 *
 * Tagger implementations for downloaded tracks.
 */

export {
  FfmpegTagger,
  NoopTagger,
  buildFfmpegArgs,
  COVER_FILE,
} from './tagger.js';

export type { FfmpegTaggerOptions } from './tagger.js';

export {
  buildTags,
  fullTitle,
  formatCopyright,
  parseGenres,
} from './tags.js';

export type { TagEntry, TagFormat } from './tags.js';

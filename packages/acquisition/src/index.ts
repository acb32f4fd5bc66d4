/**
 * @hiresdl/acquisition
 *
 * Download engine:
 * - Content resolution and discography filtering
 * - Quality negotiation
 * - Path templates
 * - Download archive and session statistics
 * - File materialization and orchestration
 */

export {
  ContentResolver,
  resolveUrl,
  type ExpandedCollection,
  type ExpandOptions,
} from './resolver.js';

export {
  filterDiscography,
  baseTitle,
  isRemaster,
  isExtra,
  type DiscographyOptions,
} from './discography.js';

export {
  negotiate,
  rejectsDowngrade,
  QUALITY_DOWNGRADE_CODE,
  type AchievedFormat,
  type Negotiation,
} from './quality.js';

export {
  buildTemplateVars,
  renderTemplate,
  displayTitle,
  type TemplateVars,
  type TemplateValue,
} from './template.js';

export { DownloadArchive } from './archive.js';

export {
  SessionStats,
  type StatsSnapshot,
  type TrackOutcome,
} from './stats.js';

export { planProgress, type ProgressPlan } from './progress.js';

export {
  FileMaterializer,
  tempFileName,
  coverUrl,
  type MaterializerDeps,
  type MaterializeContext,
} from './materializer.js';

export {
  DownloadOrchestrator,
  type OrchestratorDeps,
} from './orchestrator.js';

export {
  createSettings,
  DEFAULT_SETTINGS,
  DEFAULT_OUTPUT_TEMPLATE,
  type DownloadSettings,
} from './settings.js';

/**
 * @hiresdl/core
 *
 * Shared domain types, quality tiers, the track state machine
 * and the error taxonomy.
 */

// State machine
export { TrackStateMachine } from './stateMachine.js';

export type {
  TrackState,
  TrackStateTransition,
} from './stateMachine.js';

// Types
export type {
  NamedRef,
  ImageSet,
  Goodie,
  Page,
  TrackMeta,
  AlbumMeta,
  Restriction,
  FileUrlResponse,
  ArtistPage,
  LabelPage,
  PlaylistPage,
  UserCredential,
  UserInfo,
  LoginResponse,
  TrackSearchResponse,
} from './types/catalog.js';

export {
  ContentType,
  isCollectionType,
  assertNever,
} from './types/content.js';

export type {
  CollectionType,
  ContentRef,
} from './types/content.js';

export {
  toFileDescriptor,
  isDownloadable,
  createTrackJob,
  albumOfTrack,
} from './types/job.js';

export type {
  FileDescriptor,
  TrackJob,
} from './types/job.js';

export { noopProgress } from './types/collaborators.js';

export type {
  Credentials,
  CredentialProvider,
  TagResult,
  Tagger,
  ProgressUnit,
  ProgressSink,
} from './types/collaborators.js';

// Quality
export {
  QUALITY_IDS,
  QUALITIES,
  isQualityId,
  assertQuality,
  isLossy,
  extensionFor,
} from './quality.js';

export type { QualityId } from './quality.js';

// Errors
export {
  HiresDlError,
  AuthenticationError,
  IneligibleError,
  InvalidAppIdError,
  InvalidAppSecretError,
  InvalidQualityError,
  CancelledError,
  NonStreamableError,
  InvalidUrlError,
  TemplateError,
  RemoteError,
  TransferError,
  StateTransitionError,
  isFatalError,
  errorMessage,
} from './errors/index.js';

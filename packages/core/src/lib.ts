// Public API for consumption by other packages (dashboard, plugins)

// Errors & logging
export { BookingError, isBookingError, errorMessage } from './errors.js'
export type { BookingErrorKind } from './errors.js'
export { createLogger } from './logger.js'
export type { Logger } from './logger.js'

// Configuration
export { loadConfig, exportCredentials, splitList, ConfigError } from './config.js'
export type { AppConfig } from './config.js'

export { systemClock } from './clock.js'
export type { Clock } from './clock.js'

// Booking store
export { BookingStore, applyPatch } from './reservations/store.js'
export { backupStore } from './reservations/backup.js'
export { CSV_HEADER, parseReservationsCsv, serializeReservationsCsv } from './reservations/csv.js'
export { addNights, isValidIsoDate, toIsoDate } from './reservations/dates.js'
export { completeDraft, sameGuest, findGuestIndex } from './reservations/validation.js'
export { upcomingReservations } from './reservations/query.js'
export type { Reservation, ReservationDraft, ReservationPatch, ModifiedReservation } from './reservations/types.js'

// Calendar renderer
export { renderCalendar, sameArtifact, countEvents, eventUid, PRODID } from './calendar/renderer.js'
export type { RenderOptions, CalendarEvent } from './calendar/renderer.js'

// Publication
export { CalendarPublisher, ARTIFACT_FILE, commitMessage } from './publish/publisher.js'
export type { CalendarPublisherOptions } from './publish/publisher.js'
export { createGitRunner, GitCommandError } from './publish/git.js'
export type { GitRunner } from './publish/git.js'
export type {
  PublicationOutcome,
  PublicationState,
  PublishOperation,
  PublishRequest,
  PublishStage,
  Publisher,
} from './publish/types.js'

// Interpreter
export {
  CommandInterpreter,
  BrainLanguageModel,
  WhisperTranscriber,
  parseQuantity,
  resolveDate,
  parseAmount,
  nearestNames,
  reject,
  rejectKind,
  isMutation,
} from './interpreter/index.js'
export type {
  CommandInterpreterOptions,
  Intent,
  MutationIntent,
  RejectIntent,
  RejectReason,
  StoreSnapshot,
  LanguageModel,
  SpeechToText,
  AudioInput,
  VoiceInterpretation,
} from './interpreter/index.js'
export { createBrainQuery, collectResponse } from './brain.js'
export type { BrainSessionOptions } from './brain.js'

// Coordinator
export { OperationCoordinator, AsyncLock, publicationWarnings } from './coordinator/index.js'
export type { OperationCoordinatorOptions, OperationResult, ImportResult } from './coordinator/index.js'

// Feed import
export { fetchFeed, parseFeed } from './imports/feed.js'
export type { FeedSource } from './imports/feed.js'
export { reconcileImports, isImported, IMPORT_NOTE_PREFIX } from './imports/reconcile.js'
export type { FeedBlock, ImportReport, ImportConflict, ImportSkip } from './imports/reconcile.js'
export { FeedSyncScheduler } from './imports/scheduler.js'
export type { FeedSyncRound, FeedImporter } from './imports/scheduler.js'

// Channel types
export { toDisplayStatus, initialStatus } from './channels/index.js'
export type {
  ChannelDisplayStatus,
  ChannelStatus,
  ReconnectPolicy,
  IncomingMessage,
  OutgoingMessage,
  ChannelAttachment,
  ChannelInstanceConfig,
  ChannelPlugin,
  PluginFactory,
  ChannelInfo,
} from './channels/index.js'

// Utilities
export { computeBackoff, resolvePolicy, DEFAULT_BACKOFF } from './utils/backoff.js'
export { DedupCache } from './utils/dedup.js'
export type { DedupOptions } from './utils/dedup.js'

/**
 * Lecture-note review core: note parsing, vendor reviewers, review and
 * follow-up orchestration, the review cache and session persistence.
 */

export {
  API_KEY_ENV,
  defaultSettings,
  parseSettings,
  resolveReviewerSettings,
  type Settings,
  SettingsSchema,
  type SettingsSource,
  SettingsStore,
  type SettingsStoreOptions,
  validateSettings,
} from "./config/settingsStore";
export { ensureDir, resolveDataDir, resolveLectureDir } from "./config/statePaths";
export {
  type ControllerEvent,
  type ControllerEventHandler,
  type DocumentLoader,
  LectureReviewController,
  type LectureReviewControllerOptions,
  type RegenerateOptions,
  REVIEW_STATUS,
} from "./controller/lectureReviewController";
export {
  assertDocumentSize,
  extractPdfPageTexts,
  LectureDocument,
  type LectureDocumentOptions,
  MAX_DOCUMENT_BYTES,
  PDF_MEDIA_TYPE,
  type PageTextExtractor,
} from "./document/lectureDocument";
export {
  DocumentTooLargeError,
  MissingCredentialsError,
  ReviewTargetError,
  ReviewValidationError,
  SessionFormatError,
  SessionNotFoundError,
  SettingsFormatError,
} from "./errors";
export {
  createLogger,
  createSilentLogger,
  getLogger,
  type LoggerConfig,
  type LogLevel,
  type ReviewLogger,
  wrapLogger,
} from "./logging/logger";
export {
  ANNOTATION_MARKERS,
  markerForKind,
  parseAnnotations,
  serializeAnnotations,
} from "./notes/annotationParser";
export {
  appendFollowUp,
  createFollowUpRequest,
  type FollowUpEvent,
  type FollowUpEventHandler,
  FollowUpExchange,
} from "./review/followUpExchange";
export {
  buildLectureText,
  buildNotesPrompt,
  buildSystemPrompt,
  NOTE_KIND_LABELS,
  RESPONSE_SEPARATOR,
} from "./review/prompts";
export {
  describeProviderError,
  type ProviderErrorDescription,
  providerLabel,
} from "./review/providerErrors";
export { NO_RESPONSE_PLACEHOLDER, splitReviewResponse } from "./review/responseSplitter";
export {
  type ReviewProgress,
  ReviewRun,
  type ReviewRunEvent,
  type ReviewRunEventHandler,
  type ReviewRunState,
  type SlideBatch,
} from "./review/reviewRun";
export * from "./reviewers";
export {
  collectCachedSlides,
  collectSlidesNeedingReview,
  computeInvalidation,
  type InvalidationResult,
  lockSession,
} from "./session/reviewCache";
export {
  decodeSession,
  encodeSession,
  parseSessionJson,
  serializeSession,
  type StoredSession,
} from "./session/sessionCodec";
export { createEmptySession, getSlide, setSlideNotes } from "./session/slides";
export * from "./session/types";
export {
  FileSessionStore,
  type FileSessionStoreOptions,
  type SessionStore,
} from "./storage/sessionStore";

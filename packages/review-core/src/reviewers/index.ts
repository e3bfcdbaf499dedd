export { AnthropicNoteReviewer } from "./anthropicNoteReviewer";
export {
  BaseNoteReviewer,
  FOLLOW_UP_MAX_TOKENS,
  type NoteReviewerOptions,
  REVIEW_MAX_TOKENS,
} from "./baseNoteReviewer";
export { GeminiNoteReviewer } from "./geminiNoteReviewer";
export { OpenAINoteReviewer } from "./openaiNoteReviewer";
export {
  createNoteReviewer,
  defaultNoteReviewerFactory,
  type NoteReviewerFactory,
  type ReviewerSettings,
} from "./reviewerFactory";
export type { FollowUpRequest, NoteReviewer, ReviewCallOptions } from "./types";

/**
 * Ports - the boundaries between the orchestration core and the outside.
 *
 * - Observer / ObservationSink: platform events flowing in
 * - DecisionBackend: the service that decides what to do
 * - PlatformBackend / MediaBackend: effects flowing out
 */

export type { Observer, ObservationSink, RateLimitInput } from './observer.js';
export type {
  DecisionBackend,
  DecisionPayload,
  SerializedActionRecord,
  SerializedChannel,
  SerializedMessage,
  SerializedRateLimit,
} from './decision.js';
export type {
  BackendErrorKind,
  BackendRegistry,
  BackendResult,
  MediaBackend,
  PlatformBackend,
  PostRequest,
  RateLimitUpdate,
  ReactRequest,
  ReplyRequest,
  SendMessageRequest,
  UploadRequest,
} from './backend.js';

/**
 * @hopline/analytics - fire-and-forget access recording.
 */

export {
  QueueAnalyticsRecorder,
  LoggingAnalyticsRecorder,
  createAccessQueue,
  buildAccessEvent,
  hashIp,
  type AccessQueue,
  type AccessQueueOptions,
} from "./producer.js";
export { QUEUE_NAMES, PAYLOAD_LIMITS, type AccessEventPayload, type AnalyticsRecorder } from "./types.js";

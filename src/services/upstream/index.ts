/**
 * Upstream Service
 *
 * Connection to the generative engine: the event socket plus its HTTP
 * control API.
 */

// Types
export type {
  EngineEndpoint,
  EventBroadcaster,
  ExecutionEventSink,
  OutputImage,
} from './types.ts';
export type { PromptResponse, QueueResponse } from './schema.ts';

// Errors
export { UpstreamError, UpstreamErrorCode } from './errors.ts';

// Implementations
export { EngineClient } from './engine-client.ts';
export { UpstreamConnector, type HistoryPolling } from './connector.ts';
export { extractOutputImage, pickOutputImage } from './outputs.ts';

/**
 * Test Helpers
 *
 * Exports all test utilities for convenient importing.
 */

export { FakeBackend, RecordingBroadcaster } from './fake-backend.ts';
export { FakeEngine, type FakeEngineOptions, type RecordedRequest } from './fake-engine.ts';
export { FakeTransport, type SentFrame, type TransportMode } from './fake-transport.ts';
export { fixturePath, sampleMapping, sampleWorkflow } from './fixtures.ts';
export { createTempWorkspace, type TempWorkspace } from './temp-workspace.ts';

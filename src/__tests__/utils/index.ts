/**
 * Test Utilities
 *
 * Export all test utilities for easy import in tests.
 */

export { createStubHttp } from './StubHttp';
export type { RecordedRequest, StubResponse, StubRoute } from './StubHttp';
export { ScriptedCrewRunner } from './ScriptedCrewRunner';
export type { AgentScript, ScriptHelpers } from './ScriptedCrewRunner';
export {
  FIXED_NOW,
  TEST_ENV,
  createTestConfig,
  createTestContext,
  makeTempDir,
  readArtifact,
  removeTempDir,
} from './TestContext';
export type { TestContext, TestContextOptions } from './TestContext';
export { openEventStream } from './EventStream';
export type { EventStream, SSEMessage } from './EventStream';
export { createFakePipelines } from './FakePipelines';
export type { FakeCall } from './FakePipelines';

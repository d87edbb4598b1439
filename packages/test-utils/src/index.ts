export const PACKAGE_NAME = "@fnbridge/test-utils" as const;

export { FakeCollector, type FakeCollectorOptions } from "./fake-collector.js";
export { type FakeCall, FakeEngine, type FakeFunction } from "./fake-engine.js";
export { createRecorder, type Recorder } from "./recorder.js";
export { testDescriptor, testTelemetryConfig } from "./descriptor.js";

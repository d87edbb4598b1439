export { isEmptyChunk } from "./chunks.js";
export {
  DEFAULT_MAX_DRAIN,
  DEFAULT_READ_TIMEOUT_MS,
  ENV_STREAM_READ_TIMEOUT_MS,
  resolveStreamSettings,
  type StreamSettings,
  type StreamSettingsInput,
  StreamSettingsSchema,
} from "./config.js";
export {
  type BridgeStream,
  createStream,
  type CreateStreamOptions,
  getDefaultMailbox,
  setDefaultMailbox,
} from "./create-stream.js";
export { Mailbox } from "./mailbox.js";
export type {
  ChunkMessage,
  DoneMessage,
  StreamMessage,
  StreamPhase,
  StreamSession,
  StreamStatus,
  StreamWorker,
} from "./types.js";
export { type SpawnWorkerOptions, spawnWorker } from "./worker.js";

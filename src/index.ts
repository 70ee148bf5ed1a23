export * from "./domain/errors";
export * from "./domain/audio/types";
export { BoundedChannel, type OverflowPolicy, type ChannelResult } from "./domain/audio/BoundedChannel";
export { LinearResampler, ChunkFramer, FormatConverter, mixChannels, int16ToBuffer, bufferToInt16 } from "./domain/audio/pcm";
export { level, DEFAULT_LEVEL_GAIN } from "./domain/audio/levelMeter";
export * from "./domain/transcript/types";
export { reduceTranscript, renderTranscript, finalText, countWords, EMPTY_TRANSCRIPT } from "./domain/transcript/TranscriptReducer";
export { computeStats, formatStats, type FormattedStats } from "./domain/transcript/stats";
export { SessionStateMachine, isTerminal, type SessionState } from "./domain/session/SessionStateMachine";
export { Topics, type EventBus, type Subscription } from "./domain/events/EventBus";

export type { AudioDevicePort, RawAudioStream, RawDeviceInfo } from "./ports/audio/AudioDevicePort";
export type * from "./ports/speech/TranscriptionTransportPort";
export type { LoggerPort } from "./ports/sys/LoggerPort";

export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { SimpleEventBus } from "./adapters/sys/SimpleEventBus";
export { PvRecorderDeviceBackend } from "./adapters/audio/PvRecorderDeviceBackend";
export { WebSocketTransport } from "./adapters/speech/WebSocketTransport";
export { AssemblyAiTransport } from "./adapters/speech/AssemblyAiTransport";
export { parseBackendMessage } from "./adapters/speech/backendMessages";

export { DeviceRegistry } from "./app/DeviceRegistry";
export { CaptureEngine, CaptureHandle, DEFAULT_DEVICE_INDEX } from "./app/CaptureEngine";
export type { CaptureOptions, PullOptions, PushOptions, PushSubscription, CaptureEndReason } from "./app/CaptureEngine";
export { LiveTranscriber, LiveSession } from "./app/LiveTranscriber";
export type { StartOptions, SessionSnapshot, TranscriptUpdate, LevelUpdate } from "./app/LiveTranscriber";

export { loadConfig, resolveSettings, normalizeConfig, DEFAULT_SETTINGS } from "./config";
export type { AppConfig, Settings } from "./config";

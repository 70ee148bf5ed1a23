import { loadConfig, resolveSettings, type Settings } from "../config";
import {
  CONFIG_PATH,
  STT_API_KEY,
  STT_ENDPOINT,
  STT_PROVIDER,
  STT_MODEL,
  AUDIO_DEVICE,
  DEBUG_MODE,
} from "../env";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { SimpleEventBus } from "../adapters/sys/SimpleEventBus";
import { PvRecorderDeviceBackend } from "../adapters/audio/PvRecorderDeviceBackend";
import { WebSocketTransport } from "../adapters/speech/WebSocketTransport";
import { AssemblyAiTransport } from "../adapters/speech/AssemblyAiTransport";
import { DeviceRegistry } from "../app/DeviceRegistry";
import { CaptureEngine } from "../app/CaptureEngine";
import { LiveTranscriber, type LiveSession, type StartOptions } from "../app/LiveTranscriber";
import type { EventBus } from "../domain/events/EventBus";
import type { TranscriptionTransport } from "../ports/speech/TranscriptionTransportPort";
import type { AudioDevicePort } from "../ports/audio/AudioDevicePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";

// AssemblyAI refuses audio messages shorter than this.
const ASSEMBLYAI_MIN_CHUNK_MS = 50;

export interface ApplicationInstance {
  readonly settings: Settings;
  readonly bus: EventBus;
  readonly registry: DeviceRegistry;
  readonly transcriber: LiveTranscriber;
  start(): Promise<LiveSession>;
  shutdown(): Promise<void>;
}

export interface BuildOptions {
  settings?: Settings;
  apiKey?: string;
  debug?: boolean;
  deviceBackend?: AudioDevicePort;
  transport?: TranscriptionTransport;
}

export function buildApplication(options: BuildOptions = {}): ApplicationInstance {
  const debug = options.debug ?? DEBUG_MODE;
  const logger = new ConsoleLogger({ debug });
  const settings = options.settings ?? loadSettings(logger);

  const bus = new SimpleEventBus(logger.child("bus"));
  const deviceBackend = options.deviceBackend ?? new PvRecorderDeviceBackend();
  const registry = new DeviceRegistry(deviceBackend, logger.child("devices"));
  const capture = new CaptureEngine(registry, deviceBackend, { logger: logger.child("capture") });
  const transport = options.transport ?? createTransport(settings, logger);
  const transcriber = new LiveTranscriber({ registry, capture, transport, bus, logger: logger.child("session") });

  const startOptions = (): StartOptions => ({
    endpoint: settings.backend.endpoint,
    transport: {
      apiKey: options.apiKey ?? STT_API_KEY ?? "",
      model: settings.backend.model,
      language: settings.backend.language,
      enableSpeakerDiarization: settings.backend.enableSpeakerDiarization,
      connectTimeoutMs: settings.backend.connectTimeoutMs,
    },
    sampleRate: settings.audio.sampleRate,
    channels: settings.audio.channels,
    chunkSize: effectiveChunkSize(settings, logger),
    backlog: settings.audio.backlog,
    overflow: settings.audio.overflow,
    drainTimeoutMs: settings.session.drainTimeoutMs,
    levelGain: settings.session.levelGain,
  });

  return {
    settings,
    bus,
    registry,
    transcriber,
    start: async () => {
      transcriber.selectDevice(registry.findDevice(settings.audio.device));
      return transcriber.start(startOptions());
    },
    shutdown: async () => {
      await transcriber.stop();
    },
  };
}

function loadSettings(logger: LoggerPort): Settings {
  const { config, path: configPath } = loadConfig(CONFIG_PATH);
  if (configPath) {
    logger.info(`Loaded config from ${configPath}`);
  } else if (CONFIG_PATH) {
    logger.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
  }
  return resolveSettings(config, {
    endpoint: STT_ENDPOINT,
    provider: STT_PROVIDER,
    model: STT_MODEL,
    device: AUDIO_DEVICE,
  });
}

function createTransport(settings: Settings, logger: ConsoleLogger): TranscriptionTransport {
  switch (settings.backend.provider) {
    case "assemblyai":
      return new AssemblyAiTransport({ logger: logger.child("assemblyai") });
    case "websocket":
      return new WebSocketTransport({ logger: logger.child("transport") });
  }
}

/** Raises the chunk size to the provider's minimum message length where it has one. */
export function effectiveChunkSize(settings: Settings, logger: LoggerPort): number {
  const { chunkSize, sampleRate } = settings.audio;
  if (settings.backend.provider !== "assemblyai") return chunkSize;

  const minimum = Math.ceil((sampleRate * ASSEMBLYAI_MIN_CHUNK_MS) / 1000);
  if (chunkSize >= minimum) return chunkSize;
  logger.warn(`chunkSize ${chunkSize} is below AssemblyAI's ${ASSEMBLYAI_MIN_CHUNK_MS} ms minimum; using ${minimum}.`);
  return minimum;
}

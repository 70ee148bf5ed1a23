import fs from "fs";
import path from "path";
import type { OverflowPolicy } from "./domain/audio/BoundedChannel";
import { DEFAULT_LEVEL_GAIN } from "./domain/audio/levelMeter";

export type BackendProvider = "websocket" | "assemblyai";

export interface AudioSettings {
  device?: string;
  sampleRate: number;
  channels: number;
  chunkSize: number;
  backlog: number;
  overflow: OverflowPolicy;
}

export interface BackendSettings {
  provider: BackendProvider;
  endpoint: string;
  model?: string;
  language?: string;
  enableSpeakerDiarization: boolean;
  connectTimeoutMs: number;
}

export interface SessionSettings {
  drainTimeoutMs: number;
  levelGain: number;
}

export interface AppConfig {
  audio?: Partial<AudioSettings>;
  backend?: Partial<BackendSettings>;
  session?: Partial<SessionSettings>;
}

export interface Settings {
  audio: AudioSettings;
  backend: BackendSettings;
  session: SessionSettings;
}

export interface EnvOverrides {
  endpoint?: string;
  provider?: string;
  model?: string;
  device?: string;
}

export const DEFAULT_ENDPOINT = "ws://127.0.0.1:8765/transcribe";

export const DEFAULT_SETTINGS: Settings = {
  audio: {
    sampleRate: 16000,
    channels: 1,
    chunkSize: 256,
    backlog: 1,
    overflow: "drop-oldest",
  },
  backend: {
    provider: "websocket",
    endpoint: DEFAULT_ENDPOINT,
    enableSpeakerDiarization: false,
    connectTimeoutMs: 10000,
  },
  session: {
    drainTimeoutMs: 5000,
    levelGain: DEFAULT_LEVEL_GAIN,
  },
};

const DEFAULT_CONFIG_FILENAMES = ["config.json", "transcriber.config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

/** Layers file config over defaults, then environment/CLI overrides over both. */
export function resolveSettings(config: AppConfig, env: EnvOverrides = {}): Settings {
  const audio: AudioSettings = { ...DEFAULT_SETTINGS.audio, ...config.audio };
  const backend: BackendSettings = { ...DEFAULT_SETTINGS.backend, ...config.backend };
  const session: SessionSettings = { ...DEFAULT_SETTINGS.session, ...config.session };

  if (env.device && env.device.toLowerCase() !== "default") audio.device = env.device;
  if (env.endpoint) backend.endpoint = env.endpoint;
  if (env.model) backend.model = env.model;
  const provider = parseProvider(env.provider);
  if (provider) backend.provider = provider;

  return { audio, backend, session };
}

export function normalizeConfig(input: unknown): AppConfig {
  if (!isRecord(input)) {
    console.warn("Config root must be a JSON object; ignoring it.");
    return {};
  }
  const out: AppConfig = {};

  if (isRecord(input.audio)) {
    const audio = input.audio;
    const normalized: Partial<AudioSettings> = {};
    if (typeof audio.device === "string" && audio.device.trim()) normalized.device = audio.device.trim();
    const sampleRate = positiveInt(audio.sampleRate, "audio.sampleRate");
    if (sampleRate !== undefined) normalized.sampleRate = sampleRate;
    const channels = positiveInt(audio.channels, "audio.channels");
    if (channels !== undefined) normalized.channels = channels;
    const chunkSize = positiveInt(audio.chunkSize, "audio.chunkSize");
    if (chunkSize !== undefined) normalized.chunkSize = chunkSize;
    const backlog = positiveInt(audio.backlog, "audio.backlog");
    if (backlog !== undefined) normalized.backlog = backlog;
    if (audio.overflow === "drop-oldest" || audio.overflow === "block") {
      normalized.overflow = audio.overflow;
    } else if (audio.overflow !== undefined) {
      console.warn(`Invalid audio.overflow "${String(audio.overflow)}"; expected "drop-oldest" or "block".`);
    }
    out.audio = normalized;
  }

  if (isRecord(input.backend)) {
    const backend = input.backend;
    const normalized: Partial<BackendSettings> = {};
    const provider = parseProvider(backend.provider);
    if (provider) normalized.provider = provider;
    if (typeof backend.endpoint === "string" && backend.endpoint.trim()) normalized.endpoint = backend.endpoint.trim();
    if (typeof backend.model === "string" && backend.model.trim()) normalized.model = backend.model.trim();
    if (typeof backend.language === "string" && backend.language.trim()) normalized.language = backend.language.trim();
    if (typeof backend.enableSpeakerDiarization === "boolean") {
      normalized.enableSpeakerDiarization = backend.enableSpeakerDiarization;
    }
    const connectTimeoutMs = positiveInt(backend.connectTimeoutMs, "backend.connectTimeoutMs");
    if (connectTimeoutMs !== undefined) normalized.connectTimeoutMs = connectTimeoutMs;
    out.backend = normalized;
  }

  if (isRecord(input.session)) {
    const session = input.session;
    const normalized: Partial<SessionSettings> = {};
    const drainTimeoutMs = positiveInt(session.drainTimeoutMs, "session.drainTimeoutMs");
    if (drainTimeoutMs !== undefined) normalized.drainTimeoutMs = drainTimeoutMs;
    if (typeof session.levelGain === "number" && session.levelGain > 0) {
      normalized.levelGain = session.levelGain;
    }
    out.session = normalized;
  }

  return out;
}

function parseProvider(value: unknown): BackendProvider | undefined {
  if (value === "websocket" || value === "assemblyai") return value;
  if (value !== undefined && value !== "") {
    console.warn(`Unknown backend provider "${String(value)}"; expected "websocket" or "assemblyai".`);
  }
  return undefined;
}

function positiveInt(value: unknown, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  console.warn(`Invalid ${label} ${JSON.stringify(value)}; expected a positive integer.`);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { STT_API_KEY, LIST_DEVICES, LOG_FILE, DURATION_SECONDS } from "./env";
import { Topics, type EventBus, type Subscription } from "./domain/events/EventBus";
import type { LiveSession, TranscriptUpdate } from "./app/LiveTranscriber";
import { isTerminal, type SessionState } from "./domain/session/SessionStateMachine";
import type { Device } from "./domain/audio/types";
import { finalText } from "./domain/transcript/TranscriptReducer";
import { formatStats } from "./domain/transcript/stats";
import { describeError } from "./domain/errors";

const LIVE_LINE_WIDTH = 100;

export function formatDeviceTable(devices: readonly Device[]): string {
  if (!devices.length) return "No input devices found.";
  const rows = devices.map(
    (device) => `  [${device.index}] ${device.name} (${device.channelCount} ch, ${device.defaultSampleRate} Hz)`
  );
  return ["Input devices:", ...rows].join("\n");
}

/** Last `width` characters of the rendered transcript, on one line. */
export function liveLine(text: string, width = LIVE_LINE_WIDTH): string {
  const flat = text.replace(/\s+/g, " ");
  return flat.length > width ? `…${flat.slice(flat.length - width + 1)}` : flat;
}

/** Resolves on Ctrl+C, after `durationSeconds`, or once the session fails, whichever comes first. */
export function waitForSessionEnd(
  session: Pick<LiveSession, "state">,
  bus: EventBus,
  durationSeconds?: number
): Promise<void> {
  return new Promise<void>((resolve) => {
    let timer: NodeJS.Timeout | null = null;
    let subscription: Subscription | null = null;
    const finish = () => {
      if (timer) clearTimeout(timer);
      process.off("SIGINT", finish);
      subscription?.unsubscribe();
      resolve();
    };

    subscription = bus.subscribe<{ state: SessionState }>(Topics.SessionStateChanged, ({ state }) => {
      if (isTerminal(state)) finish();
    });
    if (isTerminal(session.state)) {
      finish();
      return;
    }
    process.once("SIGINT", finish);
    if (durationSeconds) timer = setTimeout(finish, durationSeconds * 1000);
  });
}

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = buildApplication();

  if (LIST_DEVICES) {
    console.log(formatDeviceTable(app.registry.listDevices()));
    loggingHandle.shutdown();
    return 0;
  }

  if (!STT_API_KEY) {
    console.error("Missing STT_API_KEY in .env");
    loggingHandle.shutdown();
    return 1;
  }

  app.bus.subscribe<TranscriptUpdate>(Topics.TranscriptUpdated, (update) => {
    process.stdout.write(`\r\x1b[K${liveLine(update.text)}`);
  });

  const session = await app.start();
  console.log(
    DURATION_SECONDS ? `Listening for ${DURATION_SECONDS}s… (Ctrl+C to stop)` : "Listening… (Ctrl+C to stop)"
  );

  await waitForSessionEnd(session, app.bus, DURATION_SECONDS);

  await app.shutdown();
  process.stdout.write("\n");

  const snapshot = session.snapshot();
  const stats = formatStats(snapshot.stats);
  console.log(`\nTranscript:\n${finalText(snapshot.transcript) || "(nothing recognised)"}`);
  console.log(`\nDuration ${stats.duration} · Words ${stats.words} · Sent ${stats.dataSent}`);
  if (snapshot.droppedChunks) {
    console.log(`Dropped ${snapshot.droppedChunks} audio chunk(s) while the network lagged.`);
  }
  loggingHandle.shutdown();

  if (snapshot.error) {
    console.error(`Session failed: ${snapshot.error.message}`);
    return 1;
  }
  return 0;
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(describeError(err));
      process.exit(1);
    });
}

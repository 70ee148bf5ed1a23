import { config } from 'dotenv';

config();

export const STT_API_KEY = process.env.STT_API_KEY;
export const STT_ENDPOINT = process.env.STT_ENDPOINT;
export const STT_PROVIDER = process.env.STT_PROVIDER;
export const STT_MODEL = process.env.STT_MODEL;
export let AUDIO_DEVICE = process.env.AUDIO_DEVICE || 'default';
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export let LIST_DEVICES = false;

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;
let durationArg: number | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--device':
      if (cliArgs[i + 1]) {
        AUDIO_DEVICE = cliArgs[++i];
      }
      break;
    case '--duration':
      if (cliArgs[i + 1]) {
        const seconds = Number.parseFloat(cliArgs[++i]);
        durationArg = Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
      }
      break;
    case '--list-devices':
      LIST_DEVICES = true;
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
export const DURATION_SECONDS = durationArg;

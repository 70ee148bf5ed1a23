import { ProtocolError } from "../../domain/errors";
import type { TransportEvent } from "../../ports/speech/TranscriptionTransportPort";

/**
 * Inbound frames, one event each:
 *   {"type":"ready"}
 *   {"type":"error","message":"..."}
 *   {"type":"token","text":"...","is_final":true,"confidence":0.93,"speaker_id":1}
 */
export function parseBackendMessage(raw: string): TransportEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolError(`Backend sent invalid JSON: ${truncate(raw)}`, { cause: err });
  }
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new ProtocolError(`Backend message is not an object: ${truncate(raw)}`);
  }

  const message: Record<string, unknown> = { ...payload };
  switch (message.type) {
    case "ready":
      return { kind: "control", type: "ready" };
    case "error":
      return {
        kind: "control",
        type: "error",
        message: typeof message.message === "string" && message.message ? message.message : "Unknown backend error",
      };
    case "token":
      return { kind: "token", token: parseToken(message, raw) };
    default:
      throw new ProtocolError(`Unknown backend message type ${JSON.stringify(message.type)}`);
  }
}

function parseToken(message: Record<string, unknown>, raw: string) {
  const { text, is_final: isFinal, confidence, speaker_id: speakerId } = message;
  if (typeof text !== "string" || typeof isFinal !== "boolean") {
    throw new ProtocolError(`Token message needs string "text" and boolean "is_final": ${truncate(raw)}`);
  }

  let score = 1;
  if (confidence !== undefined && confidence !== null) {
    if (typeof confidence !== "number" || !(confidence >= 0 && confidence <= 1)) {
      throw new ProtocolError(`Token confidence must be a number in [0, 1]: ${truncate(raw)}`);
    }
    score = confidence;
  }

  if (speakerId === undefined || speakerId === null) {
    return { text, isFinal, confidence: score };
  }
  if (typeof speakerId !== "number" || !Number.isInteger(speakerId)) {
    throw new ProtocolError(`Token speaker_id must be an integer: ${truncate(raw)}`);
  }
  return { text, isFinal, confidence: score, speakerId };
}

function truncate(raw: string, max = 120): string {
  return raw.length > max ? `${raw.slice(0, max)}…` : raw;
}

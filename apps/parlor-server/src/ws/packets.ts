import { v4 as uuid } from "uuid";
import type { ChatMessage, Envelope, EventType } from "@parlor/protocol";

const encoder = new TextEncoder();

export function envelope<T>(type: EventType, payload: T): Envelope<T> {
  return { type, id: uuid(), timestamp: Date.now(), payload };
}

/** Wire bytes for one server event */
export function encodeEvent<T>(type: EventType, payload: T): Uint8Array {
  return encoder.encode(JSON.stringify(envelope(type, payload)));
}

export function chatMessage(message: ChatMessage): Uint8Array {
  return encodeEvent("channel:message", message);
}

export function errorPacket(code: string, message: string): Uint8Array {
  return encodeEvent("error", { code, message });
}

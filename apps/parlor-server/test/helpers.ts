import type { ChannelMember } from "../src/channels/channel.js";
import type { SessionSocket } from "../src/sessions/session.js";
import type { ServerConfig } from "../src/config.js";
import { envelopeSchema } from "../src/ws/schemas.js";

const decoder = new TextDecoder();

export interface DecodedEvent {
  type: string;
  payload: unknown;
}

export function decode(data: Uint8Array): DecodedEvent {
  const { type, payload } = envelopeSchema.parse(JSON.parse(decoder.decode(data)));
  return { type, payload };
}

export class FakeMember implements ChannelMember {
  received: Uint8Array[] = [];
  fail = false;

  constructor(
    readonly id: number,
    readonly name: string
  ) {}

  enqueue(data: Uint8Array): void {
    if (this.fail) throw new Error("queue closed");
    this.received.push(data);
  }
}

export class FakeSocket implements SessionSocket {
  readonly OPEN = 1;
  readyState = 1;
  sent: Uint8Array[] = [];
  closedWith: { code?: number; reason?: string } | undefined;

  send(data: Uint8Array): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closedWith = { code, reason };
  }

  events(): DecodedEvent[] {
    return this.sent.map(decode);
  }

  types(): string[] {
    return this.events().map((e) => e.type);
  }

  clear(): void {
    this.sent = [];
  }
}

export const testConfig: ServerConfig = {
  port: 0,
  host: "127.0.0.1",
  dataDir: "",
  admins: ["root"],
  moderators: ["mod"],
  maxMessageLength: 50,
  sessionQueueLimit: 100,
  botName: "Parlor",
};

/** Let queued session flushes run */
export function drain(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

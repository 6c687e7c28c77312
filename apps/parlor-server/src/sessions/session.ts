import type { InstanceKind, SessionProfile } from "@parlor/protocol";
import type { ChannelMember } from "../channels/channel.js";
import { ChannelError } from "../channels/errors.js";

/** The part of a `ws` WebSocket a session writes to */
export interface SessionSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: Uint8Array): void;
  close(code?: number, reason?: string): void;
}

const POLICY_VIOLATION = 1008;

export class SessionClosedError extends ChannelError {
  constructor(name: string) {
    super("SESSION_CLOSED", `Session ${name} is closed`);
  }
}

let nextId = 1;

/**
 * One logged-in client. Payloads are queued and written on the next
 * macrotask so a broadcast never waits on a socket.
 */
export class Session implements ChannelMember {
  readonly id = nextId++;
  /** Internal names of joined channels */
  readonly channels = new Set<string>();
  /** Internal name of the current instance channel per kind */
  readonly instances = new Map<InstanceKind, string>();

  private queue: Uint8Array[] = [];
  private flushScheduled = false;
  private closed = false;

  constructor(
    readonly socket: SessionSocket,
    readonly name: string,
    readonly privileges: number,
    private readonly queueLimit: number
  ) {}

  get profile(): SessionProfile {
    return { id: this.id, name: this.name, privileges: this.privileges };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  enqueue(data: Uint8Array): void {
    if (this.closed) throw new SessionClosedError(this.name);

    if (this.queue.length >= this.queueLimit) {
      console.warn(`[session] ${this.name} (${this.id}) outbound queue full, disconnecting`);
      this.close();
      this.socket.close(POLICY_VIOLATION, "Outbound queue overflow");
      throw new SessionClosedError(this.name);
    }

    this.queue.push(data);
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      setImmediate(() => this.flush());
    }
  }

  /** Write everything queued while the socket is open */
  flush(): void {
    this.flushScheduled = false;
    if (this.closed || this.socket.readyState !== this.socket.OPEN) return;

    const batch = this.queue;
    this.queue = [];
    for (const data of batch) {
      this.socket.send(data);
    }
  }

  close(): void {
    this.closed = true;
    this.queue = [];
  }
}

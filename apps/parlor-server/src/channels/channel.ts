import { Privileges, type ChannelInfo } from "@parlor/protocol";
import { displayNameFor } from "./display-name.js";
import { ChannelDestroyedError, DuplicateMemberError } from "./errors.js";
import { Mutex } from "./mutex.js";
import { errorMessage } from "../util.js";

/** What a channel needs from a session. Channels hold these, they never own them. */
export interface ChannelMember {
  readonly id: number;
  readonly name: string;
  /** Must not block; a full or closed queue is the session's problem and may throw */
  enqueue(data: Uint8Array): void;
}

/** The directory capability a channel calls when an instance empties */
export interface ChannelRemover {
  removeChannel(channel: Channel): void;
}

export interface ChannelOptions {
  topic: string;
  read?: number;
  write?: number;
  autoJoin?: boolean;
  instance?: boolean;
}

export type LeaveResult = "left" | "not-member" | "destroyed";

export interface FanoutFailure {
  memberId: number;
  error: unknown;
}

export interface FanoutReport {
  delivered: number;
  failed: FanoutFailure[];
}

/**
 * A chat scope: membership, topic, access masks and fan-out.
 *
 * `read` and `write` are checked by whoever calls in; the channel trusts its
 * caller. Instance channels remove themselves from their directory when the
 * last member leaves.
 */
export class Channel {
  readonly internalName: string;
  topic: string;
  read: number;
  write: number;
  readonly autoJoin: boolean;
  readonly instance: boolean;

  private readonly memberMap = new Map<number, ChannelMember>();
  private readonly lock = new Mutex();
  private state: "active" | "destroyed" = "active";

  constructor(
    internalName: string,
    options: ChannelOptions,
    private readonly directory?: ChannelRemover
  ) {
    this.internalName = internalName;
    this.topic = options.topic;
    this.read = options.read ?? Privileges.Normal;
    this.write = options.write ?? Privileges.Normal;
    this.autoJoin = options.autoJoin ?? true;
    this.instance = options.instance ?? false;
  }

  /** The name clients see */
  get name(): string {
    return displayNameFor(this.internalName);
  }

  /** Read at call time; don't hold on to memberCount across an await */
  get info(): ChannelInfo {
    return { name: this.name, topic: this.topic, memberCount: this.memberMap.size };
  }

  get size(): number {
    return this.memberMap.size;
  }

  get destroyed(): boolean {
    return this.state === "destroyed";
  }

  /** Members in join order */
  get members(): ChannelMember[] {
    return Array.from(this.memberMap.values());
  }

  has(member: ChannelMember): boolean {
    return this.memberMap.has(member.id);
  }

  async join(member: ChannelMember): Promise<void> {
    await this.lock.runExclusive(() => {
      this.assertActive();
      if (this.memberMap.has(member.id)) {
        throw new DuplicateMemberError(this.internalName, member.id);
      }
      this.memberMap.set(member.id, member);
    });
  }

  /**
   * Remove `member`. When this empties an instance channel the channel is
   * destroyed and handed to the directory for removal inside the same
   * critical section, so a join queued behind it sees the destroyed state.
   */
  async leave(member: ChannelMember): Promise<LeaveResult> {
    return this.lock.runExclusive((): LeaveResult => {
      this.assertActive();
      if (!this.memberMap.delete(member.id)) {
        console.warn(`[channel] ${this} leave: ${member.name} (${member.id}) is not a member`);
        return "not-member";
      }

      if (this.instance && this.memberMap.size === 0) {
        this.state = "destroyed";
        this.directory?.removeChannel(this);
        return "destroyed";
      }
      return "left";
    });
  }

  /** Administrative destruction. Returns whoever was still a member. */
  async close(): Promise<ChannelMember[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      const former = this.members;
      this.memberMap.clear();
      this.state = "destroyed";
      return former;
    });
  }

  /** Fan `data` out to every member, skipping `sender` unless `includeSender` */
  broadcast(sender: ChannelMember, data: Uint8Array, includeSender = false): FanoutReport {
    return this.enqueue(data, includeSender ? [] : [sender.id]);
  }

  /** Deliver to exactly `targets`, members or not */
  sendSelective(
    sender: ChannelMember,
    data: Uint8Array,
    targets: Iterable<ChannelMember>
  ): FanoutReport {
    this.assertActive();
    return deliver(`${this} selective from ${sender.name}`, targets, data);
  }

  /** Deliver to every current member whose id is not in `immune` */
  enqueue(data: Uint8Array, immune: Iterable<number> = []): FanoutReport {
    this.assertActive();
    const skip = new Set(immune);
    const recipients = this.members.filter((m) => !skip.has(m.id));
    return deliver(String(this), recipients, data);
  }

  toString(): string {
    return `<${this.internalName}>`;
  }

  private assertActive(): void {
    if (this.state === "destroyed") {
      throw new ChannelDestroyedError(this.internalName);
    }
  }
}

function deliver(label: string, recipients: Iterable<ChannelMember>, data: Uint8Array): FanoutReport {
  const report: FanoutReport = { delivered: 0, failed: [] };
  for (const member of recipients) {
    try {
      member.enqueue(data);
      report.delivered++;
    } catch (err) {
      console.warn(`[channel] ${label}: delivery to ${member.name} (${member.id}) failed:`, errorMessage(err));
      report.failed.push({ memberId: member.id, error: err });
    }
  }
  return report;
}

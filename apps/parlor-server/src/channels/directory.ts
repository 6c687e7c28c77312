import { hasAnyPrivilege, type InstanceKind } from "@parlor/protocol";
import { Channel, type ChannelMember, type ChannelOptions, type ChannelRemover } from "./channel.js";
import { ChannelDestroyedError, DirectoryInconsistencyError, InvariantViolation } from "./errors.js";
import { errorMessage } from "../util.js";
import type { ChannelDefinition } from "../db/channels.js";

export type RemovalReason = "instance-empty" | "deleted";

export type RemovalListener = (channel: Channel, reason: RemovalReason, former: ChannelMember[]) => void;

const INSTANCE_PREFIXES: Record<InstanceKind, string> = {
  multiplayer: "#multi_",
  spectator: "#spec_",
};

const INSTANCE_TOPICS: Record<InstanceKind, (id: number) => string> = {
  multiplayer: (id) => `Multiplayer match #${id}`,
  spectator: (id) => `Spectating session #${id}`,
};

export function instanceChannelName(kind: InstanceKind, id: number): string {
  return `${INSTANCE_PREFIXES[kind]}${id}`;
}

/**
 * Live channels by internal name.
 *
 * Lock order: a channel's own lock is taken first; the directory is
 * synchronous and takes none, so `removeChannel` is safe to call from inside
 * `Channel.leave`.
 */
export class ChannelDirectory implements ChannelRemover {
  private channels = new Map<string, Channel>();
  private listeners: RemovalListener[] = [];

  create(name: string, options: ChannelOptions): Channel {
    if (this.channels.has(name)) {
      throw new InvariantViolation(`Channel ${name} already exists`, "CHANNEL_EXISTS");
    }
    const channel = new Channel(name, options, this);
    this.channels.set(name, channel);
    console.log(`[directory] Created ${channel}${channel.instance ? " (instance)" : ""}`);
    return channel;
  }

  /** Register persisted channels, skipping names already live */
  load(definitions: ChannelDefinition[]): Channel[] {
    const loaded: Channel[] = [];
    for (const def of definitions) {
      if (this.channels.has(def.name)) continue;
      loaded.push(
        this.create(def.name, {
          topic: def.topic,
          read: def.read,
          write: def.write,
          autoJoin: def.autoJoin,
        })
      );
    }
    return loaded;
  }

  get(name: string): Channel | undefined {
    return this.channels.get(name);
  }

  has(name: string): boolean {
    return this.channels.has(name);
  }

  list(): Channel[] {
    return Array.from(this.channels.values());
  }

  /** Non-instance channels a session holding `privileges` may read */
  listReadable(privileges: number): Channel[] {
    return this.list().filter((c) => !c.instance && hasAnyPrivilege(privileges, c.read));
  }

  autoJoinChannels(privileges: number): Channel[] {
    return this.listReadable(privileges).filter((c) => c.autoJoin);
  }

  onRemoved(listener: RemovalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Called by an instance channel whose last member just left */
  removeChannel(channel: Channel): void {
    if (this.channels.get(channel.internalName) !== channel) {
      throw new DirectoryInconsistencyError(channel.internalName);
    }
    this.channels.delete(channel.internalName);
    console.log(`[directory] Removed empty instance ${channel}`);
    this.notify(channel, "instance-empty", []);
  }

  /** Administrative removal. Returns the members the channel had, or undefined if unknown. */
  async delete(name: string): Promise<ChannelMember[] | undefined> {
    const channel = this.channels.get(name);
    if (!channel) return undefined;

    this.channels.delete(name);
    const former = await channel.close();
    console.log(`[directory] Deleted ${channel} (${former.length} member(s) dropped)`);
    this.notify(channel, "deleted", former);
    return former;
  }

  getOrCreateInstance(kind: InstanceKind, id: number, topic?: string): Channel {
    const name = instanceChannelName(kind, id);
    return (
      this.channels.get(name) ??
      this.create(name, { topic: topic ?? INSTANCE_TOPICS[kind](id), autoJoin: false, instance: true })
    );
  }

  /**
   * Join `member` to an instance channel. A join that lost the race with the
   * previous instance's teardown is redirected once to a fresh instance.
   */
  async joinInstance(kind: InstanceKind, id: number, member: ChannelMember): Promise<Channel> {
    for (let attempt = 0; ; attempt++) {
      const channel = this.getOrCreateInstance(kind, id);
      try {
        await channel.join(member);
        return channel;
      } catch (err) {
        if (!(err instanceof ChannelDestroyedError) || attempt > 0) throw err;
        console.log(`[directory] ${channel} torn down during join, redirecting ${member.name}`);
      }
    }
  }

  private notify(channel: Channel, reason: RemovalReason, former: ChannelMember[]): void {
    for (const listener of this.listeners) {
      try {
        listener(channel, reason, former);
      } catch (err) {
        console.error(`[directory] Removal listener failed for ${channel}:`, errorMessage(err));
      }
    }
  }
}

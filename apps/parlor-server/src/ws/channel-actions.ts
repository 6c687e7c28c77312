import { hasAnyPrivilege, type InstanceKind } from "@parlor/protocol";
import type { Channel, ChannelMember, LeaveResult } from "../channels/channel.js";
import type { RemovalReason } from "../channels/directory.js";
import { ChannelDestroyedError, ChannelError } from "../channels/errors.js";
import { isInstanceAlias } from "../channels/display-name.js";
import type { Session } from "../sessions/session.js";
import type { ServerContext } from "../context.js";
import { encodeEvent } from "./packets.js";

const ALIAS_KINDS: Record<string, InstanceKind> = {
  "#multiplayer": "multiplayer",
  "#spectator": "spectator",
};

/** Look a channel up by internal name, or by `#multiplayer`/`#spectator` for the session's own instance */
export function resolveChannel(ctx: ServerContext, session: Session, name: string): Channel {
  let internalName: string | undefined = name;
  if (isInstanceAlias(name)) {
    internalName = session.instances.get(ALIAS_KINDS[name]);
  }

  const channel = internalName !== undefined ? ctx.directory.get(internalName) : undefined;
  if (!channel) {
    throw new ChannelError("NOT_FOUND", `Channel ${name} not found`);
  }
  return channel;
}

/** Sessions allowed to see a channel in their list */
export function readersOf(ctx: ServerContext, channel: Channel): Session[] {
  if (channel.instance) {
    return ctx.sessions.all().filter((s) => channel.has(s));
  }
  return ctx.sessions.all().filter((s) => hasAnyPrivilege(s.privileges, channel.read));
}

/** Push the channel's current summary to everyone who can see it */
export function announceInfo(ctx: ServerContext, cause: Session, channel: Channel): void {
  channel.sendSelective(cause, encodeEvent("channel:info", { channel: channel.info }), readersOf(ctx, channel));
}

export async function joinChannel(ctx: ServerContext, session: Session, channel: Channel): Promise<void> {
  await channel.join(session);
  afterJoin(ctx, session, channel);
}

/**
 * Bookkeeping and notifications once `session` is a member. An admin delete
 * can destroy the channel between the join and this continuation; the
 * removal notice has then already gone out and there is nothing to record.
 */
export function afterJoin(ctx: ServerContext, session: Session, channel: Channel, kind?: InstanceKind): void {
  if (channel.destroyed) return;

  session.channels.add(channel.internalName);
  if (kind !== undefined) session.instances.set(kind, channel.internalName);
  session.enqueue(encodeEvent("channel:joined", { channel: channel.info }));
  channel.enqueue(encodeEvent("member:join", { channel: channel.name, member: session.profile }), [session.id]);
  announceInfo(ctx, session, channel);
}

/**
 * Take `session` out of `channel`. `notifySelf` is off when the session is
 * already disconnected.
 */
export async function leaveChannel(
  ctx: ServerContext,
  session: Session,
  channel: Channel,
  notifySelf = true
): Promise<void> {
  if (!channel.has(session)) {
    throw new ChannelError("NOT_JOINED", `You are not in ${channel.name}`);
  }

  let result: LeaveResult;
  try {
    result = await channel.leave(session);
  } catch (err) {
    // Deleted while the leave waited for the lock: the session is out either way
    if (!(err instanceof ChannelDestroyedError)) throw err;
    result = "destroyed";
  }
  forget(session, channel);

  if (notifySelf) {
    session.enqueue(encodeEvent("channel:left", { channel: channel.name }));
  }
  // Another member's final leave may have torn the channel down before this resumed
  if (result === "left" && !channel.destroyed) {
    channel.enqueue(encodeEvent("member:leave", { channel: channel.name, memberId: session.id }));
    announceInfo(ctx, session, channel);
  }
}

/** Directory removal listener: tell whoever could see the channel that it is gone */
export function notifyRemoval(
  ctx: ServerContext,
  channel: Channel,
  reason: RemovalReason,
  former: ChannelMember[]
): void {
  const recipients = new Map<number, Session>();
  for (const member of former) {
    const session = ctx.sessions.getById(member.id);
    if (session) {
      forget(session, channel);
      recipients.set(session.id, session);
    }
  }
  if (!channel.instance) {
    for (const session of ctx.sessions.all()) {
      if (hasAnyPrivilege(session.privileges, channel.read)) recipients.set(session.id, session);
    }
  }

  console.log(`[ws] ${channel} removed (${reason}), notifying ${recipients.size} session(s)`);
  const data = encodeEvent("channel:removed", { channel: channel.name });
  for (const session of recipients.values()) {
    if (session.isClosed) continue;
    try {
      session.enqueue(data);
    } catch (err) {
      console.warn(`[ws] Could not notify ${session.name} of ${channel} removal:`, err);
    }
  }
}

function forget(session: Session, channel: Channel): void {
  session.channels.delete(channel.internalName);
  for (const [kind, name] of session.instances) {
    if (name === channel.internalName) session.instances.delete(kind);
  }
}

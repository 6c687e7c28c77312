import type { WebSocket, RawData } from "ws";
import type { z } from "zod";
import { Privileges, Staff, hasAnyPrivilege, type InstanceKind } from "@parlor/protocol";
import { instanceChannelName } from "../channels/directory.js";
import { ChannelError, DuplicateMemberError } from "../channels/errors.js";
import { Mutex } from "../channels/mutex.js";
import { Session, type SessionSocket } from "../sessions/session.js";
import { isCommand, runCommand } from "../chat/commands.js";
import {
  saveChannelDefinition,
  setChannelTopic,
  deleteChannelDefinition,
  type ChannelDefinition,
} from "../db/channels.js";
import type { ServerContext } from "../context.js";
import { errorMessage } from "../util.js";
import { chatMessage, encodeEvent, errorPacket } from "./packets.js";
import {
  afterJoin,
  announceInfo,
  joinChannel,
  leaveChannel,
  resolveChannel,
} from "./channel-actions.js";
import {
  envelopeSchema,
  sessionLoginSchema,
  channelJoinSchema,
  channelLeaveSchema,
  channelMessageSchema,
  channelTopicSchema,
  channelCreateSchema,
  channelDeleteSchema,
  instanceJoinSchema,
} from "./schemas.js";

const BOT_ID = 0;
const RESERVED_PREFIXES = ["#multi_", "#spec_"];

export function handleConnection(ws: WebSocket, ctx: ServerContext): void {
  // One inbound message at a time per socket, so a client's commands apply in the order sent
  const inbox = new Mutex();

  ws.on("message", (data: RawData) => {
    inbox.runExclusive(() => handleMessage(ws, data.toString(), ctx)).catch((err) => {
      console.error("[ws] Unhandled error while processing message:", errorMessage(err));
    });
  });

  ws.on("close", () => {
    inbox.runExclusive(() => handleClose(ws, ctx)).catch((err) => {
      console.error("[ws] Unhandled error while closing session:", errorMessage(err));
    });
  });
}

export async function handleMessage(socket: SessionSocket, raw: string, ctx: ServerContext): Promise<void> {
  try {
    const envelope = parse(envelopeSchema, JSON.parse(raw));
    await dispatch(socket, envelope.type, envelope.payload, ctx);
  } catch (err) {
    reportError(socket, ctx, err);
  }
}

/** Drop the socket's session and take it out of every channel it was in */
export async function handleClose(socket: SessionSocket, ctx: ServerContext): Promise<void> {
  const session = ctx.sessions.remove(socket);
  if (!session) return;

  session.close();
  for (const name of Array.from(session.channels)) {
    const channel = ctx.directory.get(name);
    if (!channel || channel.destroyed || !channel.has(session)) continue;
    try {
      await leaveChannel(ctx, session, channel, false);
    } catch (err) {
      console.error(`[ws] ${session.name} could not leave ${channel} on disconnect:`, errorMessage(err));
    }
  }
  console.log(`[ws] ${session.name} (${session.id}) disconnected`);
}

async function dispatch(socket: SessionSocket, type: string, payload: unknown, ctx: ServerContext): Promise<void> {
  if (type === "session:login") {
    await handleLogin(socket, parse(sessionLoginSchema, payload).name, ctx);
    return;
  }

  const session = ctx.sessions.get(socket);
  if (!session) {
    throw new ChannelError("NOT_LOGGED_IN", "Log in first");
  }

  switch (type) {
    case "channel:join":
      await handleChannelJoin(session, parse(channelJoinSchema, payload).channel, ctx);
      break;
    case "channel:leave": {
      const { channel } = parse(channelLeaveSchema, payload);
      await leaveChannel(ctx, session, resolveChannel(ctx, session, channel));
      break;
    }
    case "channel:message": {
      const { channel, text } = parse(channelMessageSchema, payload);
      handleChannelMessage(session, channel, text, ctx);
      break;
    }
    case "channel:topic": {
      const { channel, topic } = parse(channelTopicSchema, payload);
      handleChannelTopic(session, channel, topic, ctx);
      break;
    }
    case "channel:create":
      handleChannelCreate(session, parse(channelCreateSchema, payload), ctx);
      break;
    case "channel:delete":
      await handleChannelDelete(session, parse(channelDeleteSchema, payload).channel, ctx);
      break;
    case "instance:join": {
      const { kind, id } = parse(instanceJoinSchema, payload);
      await handleInstanceJoin(session, kind, id, ctx);
      break;
    }
    default:
      throw new ChannelError("UNKNOWN_TYPE", `Unknown message type: ${type}`);
  }
}

async function handleLogin(socket: SessionSocket, name: string, ctx: ServerContext): Promise<void> {
  if (ctx.sessions.get(socket)) {
    throw new ChannelError("ALREADY_LOGGED_IN", "This connection is already logged in");
  }
  if (ctx.sessions.getByName(name)) {
    throw new ChannelError("NAME_TAKEN", `${name} is already online`);
  }

  const lower = name.toLowerCase();
  let privileges: number = Privileges.Normal;
  if (ctx.config.admins.includes(lower)) privileges |= Privileges.Admin;
  if (ctx.config.moderators.includes(lower)) privileges |= Privileges.Moderator;

  const session = new Session(socket, name, privileges, ctx.config.sessionQueueLimit);
  ctx.sessions.add(session);
  console.log(`[ws] ${name} (${session.id}) logged in`);

  session.enqueue(
    encodeEvent("session:welcome", {
      session: session.profile,
      channels: ctx.directory.listReadable(privileges).map((c) => c.info),
    })
  );

  for (const channel of ctx.directory.autoJoinChannels(privileges)) {
    await joinChannel(ctx, session, channel);
  }
}

async function handleChannelJoin(session: Session, name: string, ctx: ServerContext): Promise<void> {
  const channel = resolveChannel(ctx, session, name);
  if (channel.instance) {
    throw new ChannelError("FORBIDDEN", "Instance channels are joined with instance:join");
  }
  if (!hasAnyPrivilege(session.privileges, channel.read)) {
    throw new ChannelError("FORBIDDEN", `You cannot read ${channel.name}`);
  }
  await joinChannel(ctx, session, channel);
}

function handleChannelMessage(session: Session, name: string, raw: string, ctx: ServerContext): void {
  const channel = resolveChannel(ctx, session, name);
  if (!hasAnyPrivilege(session.privileges, channel.write)) {
    throw new ChannelError("FORBIDDEN", `You cannot write to ${channel.name}`);
  }
  if (!channel.has(session)) {
    throw new ChannelError("NOT_JOINED", `Join ${channel.name} first`);
  }

  const text = raw.trim();
  if (!text) {
    throw new ChannelError("EMPTY_MESSAGE", "Message is empty");
  }
  if (text.length > ctx.config.maxMessageLength) {
    throw new ChannelError("MESSAGE_TOO_LONG", `Messages are limited to ${ctx.config.maxMessageLength} characters`);
  }

  const said = chatMessage({ sender: session.name, senderId: session.id, target: channel.name, text });
  if (!isCommand(text)) {
    channel.broadcast(session, said, false);
    return;
  }

  const result = runCommand(text, session, channel, ctx.random);
  const reply = chatMessage({ sender: ctx.config.botName, senderId: BOT_ID, target: channel.name, text: result.response });
  if (result.hidden) {
    channel.sendSelective(session, reply, [session]);
  } else {
    channel.broadcast(session, said, false);
    channel.enqueue(reply);
  }
}

function handleChannelTopic(session: Session, name: string, topic: string, ctx: ServerContext): void {
  if (!hasAnyPrivilege(session.privileges, Staff)) {
    throw new ChannelError("FORBIDDEN", "Only staff can change topics");
  }
  const channel = resolveChannel(ctx, session, name);

  channel.topic = topic;
  if (!channel.instance) {
    setChannelTopic(channel.internalName, topic);
  }
  console.log(`[ws] ${session.name} set topic of ${channel}: ${topic}`);

  channel.enqueue(encodeEvent("channel:topic", { channel: channel.name, topic }));
  announceInfo(ctx, session, channel);
}

function handleChannelCreate(
  session: Session,
  payload: z.infer<typeof channelCreateSchema>,
  ctx: ServerContext
): void {
  if (!hasAnyPrivilege(session.privileges, Privileges.Admin)) {
    throw new ChannelError("FORBIDDEN", "Only admins can create channels");
  }
  if (RESERVED_PREFIXES.some((prefix) => payload.name.startsWith(prefix))) {
    throw new ChannelError("INVALID_NAME", `${payload.name} uses a reserved instance prefix`);
  }
  if (ctx.directory.has(payload.name)) {
    throw new ChannelError("CHANNEL_EXISTS", `Channel ${payload.name} already exists`);
  }

  // Stored first, so a failed write leaves no live channel behind
  const definition: ChannelDefinition = {
    name: payload.name,
    topic: payload.topic,
    read: payload.read ?? Privileges.Normal,
    write: payload.write ?? Privileges.Normal,
    autoJoin: payload.autoJoin ?? true,
  };
  saveChannelDefinition(definition);
  const channel = ctx.directory.create(definition.name, definition);

  announceInfo(ctx, session, channel);
}

async function handleChannelDelete(session: Session, name: string, ctx: ServerContext): Promise<void> {
  if (!hasAnyPrivilege(session.privileges, Privileges.Admin)) {
    throw new ChannelError("FORBIDDEN", "Only admins can delete channels");
  }
  const channel = resolveChannel(ctx, session, name);

  await ctx.directory.delete(channel.internalName);
  if (!channel.instance) {
    deleteChannelDefinition(channel.internalName);
  }
}

async function handleInstanceJoin(
  session: Session,
  kind: InstanceKind,
  id: number,
  ctx: ServerContext
): Promise<void> {
  const current = session.instances.get(kind);
  if (current === instanceChannelName(kind, id)) {
    throw new DuplicateMemberError(current, session.id);
  }
  const currentChannel = current !== undefined ? ctx.directory.get(current) : undefined;
  if (currentChannel) {
    await leaveChannel(ctx, session, currentChannel);
  }

  const channel = await ctx.directory.joinInstance(kind, id, session);
  afterJoin(ctx, session, channel, kind);
}

function parse<T>(schema: z.ZodType<T>, payload: unknown): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ChannelError("INVALID_MESSAGE", result.error.issues.map((i) => i.message).join("; "));
  }
  return result.data;
}

function reportError(socket: SessionSocket, ctx: ServerContext, err: unknown): void {
  let data: Uint8Array;
  if (err instanceof ChannelError) {
    data = errorPacket(err.code, err.message);
  } else if (err instanceof SyntaxError) {
    data = errorPacket("INVALID_MESSAGE", "Failed to parse message");
  } else {
    console.error("[ws] Command failed:", err);
    data = errorPacket("INTERNAL_ERROR", "Something went wrong");
  }

  const session = ctx.sessions.get(socket);
  if (session && !session.isClosed) {
    session.enqueue(data);
  } else if (socket.readyState === socket.OPEN) {
    socket.send(data);
  }
}

import { z } from "zod";
import type {
  ChannelCreateCommand,
  ChannelDeleteCommand,
  ChannelJoinCommand,
  ChannelLeaveCommand,
  ChannelMessageCommand,
  ChannelTopicCommand,
  InstanceJoinCommand,
  SessionLoginCommand,
} from "@parlor/protocol";

const channelName = z.string().trim().min(1).max(64);

export const envelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
});

export const sessionLoginSchema: z.ZodType<SessionLoginCommand> = z.object({
  name: z.string().trim().min(1).max(32),
});

export const channelJoinSchema: z.ZodType<ChannelJoinCommand> = z.object({
  channel: channelName,
});

export const channelLeaveSchema: z.ZodType<ChannelLeaveCommand> = z.object({
  channel: channelName,
});

export const channelMessageSchema: z.ZodType<ChannelMessageCommand> = z.object({
  channel: channelName,
  text: z.string(),
});

export const channelTopicSchema: z.ZodType<ChannelTopicCommand> = z.object({
  channel: channelName,
  topic: z.string().trim().max(256),
});

export const channelCreateSchema: z.ZodType<ChannelCreateCommand> = z.object({
  name: channelName.regex(/^#\S+$/, "Channel names start with # and contain no spaces"),
  topic: z.string().trim().max(256),
  read: z.number().int().positive().optional(),
  write: z.number().int().positive().optional(),
  autoJoin: z.boolean().optional(),
});

export const channelDeleteSchema: z.ZodType<ChannelDeleteCommand> = z.object({
  channel: channelName,
});

export const instanceJoinSchema: z.ZodType<InstanceJoinCommand> = z.object({
  kind: z.enum(["multiplayer", "spectator"]),
  id: z.number().int().nonnegative(),
});

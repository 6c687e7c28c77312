import type { InstanceKind } from "./channel.js";

/** Client → Server commands */

export interface SessionLoginCommand {
  name: string;
}

export interface ChannelJoinCommand {
  channel: string;
}

export interface ChannelLeaveCommand {
  channel: string;
}

export interface ChannelMessageCommand {
  channel: string;
  text: string;
}

export interface ChannelTopicCommand {
  channel: string;
  topic: string;
}

export interface ChannelCreateCommand {
  name: string;
  topic: string;
  read?: number;
  write?: number;
  autoJoin?: boolean;
}

export interface ChannelDeleteCommand {
  channel: string;
}

export interface InstanceJoinCommand {
  kind: InstanceKind;
  id: number;
}

/** Union of all command types for the type field */
export type CommandType =
  | "session:login"
  | "channel:join"
  | "channel:leave"
  | "channel:message"
  | "channel:topic"
  | "channel:create"
  | "channel:delete"
  | "instance:join";

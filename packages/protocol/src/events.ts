import type { ChannelInfo } from "./channel.js";
import type { ChatMessage } from "./messages.js";
import type { SessionProfile } from "./user.js";

/** Server → Client events */

export interface SessionWelcomeEvent {
  session: SessionProfile;
  channels: ChannelInfo[];
}

export interface ErrorEvent {
  code: string;
  message: string;
}

export interface ChannelJoinedEvent {
  channel: ChannelInfo;
}

export interface ChannelLeftEvent {
  channel: string;
}

export interface ChannelInfoEvent {
  channel: ChannelInfo;
}

export interface ChannelMessageEvent extends ChatMessage {}

export interface ChannelTopicEvent {
  channel: string;
  topic: string;
}

export interface ChannelRemovedEvent {
  channel: string;
}

export interface MemberJoinEvent {
  channel: string;
  member: SessionProfile;
}

export interface MemberLeaveEvent {
  channel: string;
  memberId: number;
}

/** Union of all event types for the type field */
export type EventType =
  | "session:welcome"
  | "error"
  | "channel:joined"
  | "channel:left"
  | "channel:info"
  | "channel:message"
  | "channel:topic"
  | "channel:removed"
  | "member:join"
  | "member:leave";

export {
  Privileges,
  Staff,
  hasAnyPrivilege,
  type Privilege,
  type InstanceKind,
  type ChannelInfo,
} from "./channel.js";

export type { Envelope, ChatMessage } from "./messages.js";
export type { SessionProfile } from "./user.js";
export type * from "./commands.js";
export type * from "./events.js";

/** Privilege bit flags. A channel's read/write masks are checked against these. */
export const Privileges = {
  Normal: 1 << 0,
  Verified: 1 << 1,
  Supporter: 1 << 2,
  Moderator: 1 << 3,
  Admin: 1 << 4,
  Developer: 1 << 5,
} as const;

export type Privilege = (typeof Privileges)[keyof typeof Privileges];

/** Any staff flag */
export const Staff = Privileges.Moderator | Privileges.Admin | Privileges.Developer;

/** True when `held` shares at least one flag with `required` */
export function hasAnyPrivilege(held: number, required: number): boolean {
  return (held & required) !== 0;
}

export type InstanceKind = "multiplayer" | "spectator";

export interface ChannelInfo {
  name: string;
  topic: string;
  memberCount: number;
}

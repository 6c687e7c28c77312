/**
 * Instanced channels share one display identity per kind: every
 * `#multi_<id>` shows up to clients as `#multiplayer`.
 */
const INSTANCE_ALIASES: readonly (readonly [prefix: string, alias: string])[] = [
  ["#spec_", "#spectator"],
  ["#multi_", "#multiplayer"],
];

export function displayNameFor(internalName: string): string {
  for (const [prefix, alias] of INSTANCE_ALIASES) {
    if (internalName.startsWith(prefix)) return alias;
  }
  return internalName;
}

/** True for names clients use to address their current instance channel */
export function isInstanceAlias(name: string): boolean {
  return INSTANCE_ALIASES.some(([, alias]) => alias === name);
}

import { ChannelDirectory } from "./channels/directory.js";
import { SessionRegistry } from "./sessions/registry.js";
import { notifyRemoval } from "./ws/channel-actions.js";
import defaultConfig, { type ServerConfig } from "./config.js";

export interface ServerContext {
  directory: ChannelDirectory;
  sessions: SessionRegistry;
  config: ServerConfig;
  /** Source for `!roll` */
  random: () => number;
}

export function createContext(overrides: Partial<ServerContext> = {}): ServerContext {
  const ctx: ServerContext = {
    directory: overrides.directory ?? new ChannelDirectory(),
    sessions: overrides.sessions ?? new SessionRegistry(),
    config: overrides.config ?? defaultConfig,
    random: overrides.random ?? Math.random,
  };
  ctx.directory.onRemoved((channel, reason, former) => notifyRemoval(ctx, channel, reason, former));
  return ctx;
}

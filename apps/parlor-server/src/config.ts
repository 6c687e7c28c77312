function parseNames(raw: string | undefined): string[] {
  return (
    raw
      ?.split(";")
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean) ?? []
  );
}

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** Lower-cased session names granted Admin on login */
  admins: string[];
  /** Lower-cased session names granted Moderator on login */
  moderators: string[];
  maxMessageLength: number;
  /** Outbound payloads a session may hold before it is disconnected */
  sessionQueueLimit: number;
  botName: string;
}

const config: ServerConfig = {
  port: parseInt(process.env.PORT ?? "9000", 10),
  host: process.env.HOST ?? "0.0.0.0",
  dataDir: process.env.DATA_DIR ?? "./data",
  admins: parseNames(process.env.ADMINS),
  moderators: parseNames(process.env.MODERATORS),
  maxMessageLength: parseInt(process.env.MAX_MESSAGE_LENGTH ?? "2000", 10),
  sessionQueueLimit: parseInt(process.env.SESSION_QUEUE_LIMIT ?? "512", 10),
  botName: process.env.BOT_NAME?.trim() || "Parlor",
};

export default config;

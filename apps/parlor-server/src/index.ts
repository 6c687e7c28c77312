import Fastify from "fastify";
import { Privileges } from "@parlor/protocol";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { initDb, closeDb } from "./db/database.js";
import { ensureDefaultChannels, getChannelDefinitions } from "./db/channels.js";
import { createContext } from "./context.js";
import { handleConnection } from "./ws/handler.js";
import { errorMessage } from "./util.js";
import config from "./config.js";

async function main() {
  initDb();
  ensureDefaultChannels();

  const ctx = createContext({ config });
  const loaded = ctx.directory.load(getChannelDefinitions());
  console.log(`[server] Loaded ${loaded.length} channel(s): ${loaded.map((c) => c.internalName).join(", ")}`);
  if (config.admins.length > 0) {
    console.log(`[server] Admins: ${config.admins.join(", ")}`);
  }

  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  app.get("/ws", { websocket: true }, (socket) => {
    handleConnection(socket, ctx);
  });

  app.get("/health", async () => ({
    status: "ok",
    sessions: ctx.sessions.size,
    channels: ctx.directory.list().length,
  }));

  app.get("/channels", async () => ctx.directory.listReadable(Privileges.Normal).map((c) => c.info));

  await app.listen({ port: config.port, host: config.host });
  console.log(`[server] Listening on ${config.host}:${config.port}`);

  const shutdown = async () => {
    console.log("\n[server] Shutting down...");
    await app.close();
    closeDb();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[server] Shutdown failed:", errorMessage(err));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[server] Fatal error:", errorMessage(err));
  process.exit(1);
});

import { Privileges, Staff } from "@parlor/protocol";
import { getDb } from "./database.js";

/** A persisted, non-instance channel */
export interface ChannelDefinition {
  name: string;
  topic: string;
  read: number;
  write: number;
  autoJoin: boolean;
}

interface ChannelRow {
  name: string;
  topic: string;
  read_priv: number;
  write_priv: number;
  auto_join: number;
  created_at: number;
}

const DEFAULT_CHANNELS: ChannelDefinition[] = [
  { name: "#general", topic: "General discussion.", read: Privileges.Normal, write: Privileges.Normal, autoJoin: true },
  { name: "#lobby", topic: "Find players for a match.", read: Privileges.Normal, write: Privileges.Normal, autoJoin: true },
  { name: "#announce", topic: "Server announcements.", read: Privileges.Normal, write: Staff, autoJoin: true },
  { name: "#staff", topic: "Staff only.", read: Staff, write: Staff, autoJoin: false },
];

export function getChannelDefinitions(): ChannelDefinition[] {
  const rows = getDb()
    .prepare<[], ChannelRow>("SELECT * FROM channels ORDER BY rowid ASC")
    .all();

  return rows.map(rowToDefinition);
}

export function saveChannelDefinition(def: ChannelDefinition): void {
  getDb()
    .prepare(
      `INSERT INTO channels (name, topic, read_priv, write_priv, auto_join, created_at) VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET topic = excluded.topic, read_priv = excluded.read_priv,
         write_priv = excluded.write_priv, auto_join = excluded.auto_join`
    )
    .run(def.name, def.topic, def.read, def.write, def.autoJoin ? 1 : 0, Date.now());
}

export function setChannelTopic(name: string, topic: string): boolean {
  const result = getDb().prepare("UPDATE channels SET topic = ? WHERE name = ?").run(topic, name);
  return result.changes > 0;
}

export function deleteChannelDefinition(name: string): boolean {
  const result = getDb().prepare("DELETE FROM channels WHERE name = ?").run(name);
  return result.changes > 0;
}

/** Seed the default channels on first boot */
export function ensureDefaultChannels(): void {
  if (getChannelDefinitions().length > 0) return;
  const insert = getDb().transaction((defs: ChannelDefinition[]) => {
    for (const def of defs) saveChannelDefinition(def);
  });
  insert(DEFAULT_CHANNELS);
}

function rowToDefinition(row: ChannelRow): ChannelDefinition {
  return {
    name: row.name,
    topic: row.topic,
    read: row.read_priv,
    write: row.write_priv,
    autoJoin: row.auto_join === 1,
  };
}

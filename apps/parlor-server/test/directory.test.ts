import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Privileges, Staff } from "@parlor/protocol";
import { ChannelDirectory, instanceChannelName } from "../src/channels/directory.js";
import { ChannelDestroyedError, InvariantViolation } from "../src/channels/errors.js";
import { FakeMember } from "./helpers.js";

describe("ChannelDirectory", () => {
  let directory: ChannelDirectory;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    directory = new ChannelDirectory();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses a second channel under the same name", () => {
    directory.create("#general", { topic: "" });
    expect(() => directory.create("#general", { topic: "again" })).toThrow(InvariantViolation);
    expect(directory.list()).toHaveLength(1);
  });

  it("loads definitions, skipping live names", () => {
    directory.create("#general", { topic: "live" });
    const loaded = directory.load([
      { name: "#general", topic: "stored", read: Privileges.Normal, write: Privileges.Normal, autoJoin: true },
      { name: "#staff", topic: "staff", read: Staff, write: Staff, autoJoin: false },
    ]);

    expect(loaded.map((c) => c.internalName)).toEqual(["#staff"]);
    expect(directory.get("#general")?.topic).toBe("live");
    expect(directory.get("#staff")?.autoJoin).toBe(false);
  });

  it("lists what a privilege mask can read", () => {
    directory.create("#general", { topic: "" });
    directory.create("#quiet", { topic: "", autoJoin: false });
    directory.create("#staff", { topic: "", read: Staff, write: Staff, autoJoin: false });
    directory.getOrCreateInstance("multiplayer", 1);

    expect(directory.listReadable(Privileges.Normal).map((c) => c.internalName)).toEqual(["#general", "#quiet"]);
    expect(directory.listReadable(Privileges.Normal | Privileges.Moderator).map((c) => c.internalName)).toEqual([
      "#general",
      "#quiet",
      "#staff",
    ]);
    expect(directory.autoJoinChannels(Privileges.Normal).map((c) => c.internalName)).toEqual(["#general"]);
  });

  describe("instances", () => {
    it("names instances by kind", () => {
      expect(instanceChannelName("multiplayer", 12)).toBe("#multi_12");
      expect(instanceChannelName("spectator", 4)).toBe("#spec_4");
    });

    it("creates an instance once and reuses it", () => {
      const first = directory.getOrCreateInstance("multiplayer", 3);
      const second = directory.getOrCreateInstance("multiplayer", 3);

      expect(second).toBe(first);
      expect(first.instance).toBe(true);
      expect(first.autoJoin).toBe(false);
      expect(first.topic).toBe("Multiplayer match #3");
      expect(first.name).toBe("#multiplayer");
    });

    it("uses a given topic", () => {
      expect(directory.getOrCreateInstance("spectator", 8, "Watching bob").topic).toBe("Watching bob");
    });

    it("redirects a join that lost the race with teardown", async () => {
      const alice = new FakeMember(1, "alice");
      const bob = new FakeMember(2, "bob");
      const old = await directory.joinInstance("multiplayer", 5, alice);

      const leaving = old.leave(alice);
      const joining = directory.joinInstance("multiplayer", 5, bob);

      await expect(leaving).resolves.toBe("destroyed");
      const fresh = await joining;
      expect(fresh).not.toBe(old);
      expect(fresh.members).toEqual([bob]);
      expect(directory.get("#multi_5")).toBe(fresh);
    });

    it("does not redirect other failures", async () => {
      const alice = new FakeMember(1, "alice");
      await directory.joinInstance("spectator", 2, alice);

      await expect(directory.joinInstance("spectator", 2, alice)).rejects.toMatchObject({ code: "ALREADY_JOINED" });
    });
  });

  describe("removal", () => {
    it("notifies listeners when an instance empties", async () => {
      const listener = vi.fn();
      directory.onRemoved(listener);
      const alice = new FakeMember(1, "alice");
      const channel = await directory.joinInstance("multiplayer", 1, alice);

      await channel.leave(alice);

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(channel, "instance-empty", []);
    });

    it("deletes administratively and hands back the members", async () => {
      const listener = vi.fn();
      directory.onRemoved(listener);
      const alice = new FakeMember(1, "alice");
      const channel = directory.create("#general", { topic: "" });
      await channel.join(alice);

      const former = await directory.delete("#general");

      expect(former).toEqual([alice]);
      expect(directory.has("#general")).toBe(false);
      expect(channel.destroyed).toBe(true);
      expect(listener).toHaveBeenCalledWith(channel, "deleted", [alice]);
      await expect(channel.join(alice)).rejects.toBeInstanceOf(ChannelDestroyedError);
    });

    it("returns undefined for an unknown name", async () => {
      await expect(directory.delete("#nope")).resolves.toBeUndefined();
    });

    it("stops notifying after unsubscribe", async () => {
      const listener = vi.fn();
      const unsubscribe = directory.onRemoved(listener);
      directory.create("#general", { topic: "" });
      unsubscribe();

      await directory.delete("#general");
      expect(listener).not.toHaveBeenCalled();
    });

    it("keeps notifying past a failing listener", async () => {
      const second = vi.fn();
      directory.onRemoved(() => {
        throw new Error("boom");
      });
      directory.onRemoved(second);
      directory.create("#general", { topic: "" });

      await directory.delete("#general");

      expect(second).toHaveBeenCalledOnce();
      expect(console.error).toHaveBeenCalledOnce();
    });
  });
});

import type { Channel, ChannelMember } from "../channels/channel.js";

export interface CommandContext {
  sender: ChannelMember;
  channel: Channel;
  args: string[];
  random: () => number;
}

export interface CommandResult {
  /** Hidden commands are answered to the sender alone and never echoed */
  hidden: boolean;
  response: string;
}

interface ChatCommand {
  usage: string;
  hidden: boolean;
  run(ctx: CommandContext): string;
}

const DEFAULT_ROLL = 100;
const MAX_ROLL = 0x7fffffff;

const commands: Record<string, ChatCommand> = {
  help: {
    usage: "!help",
    hidden: true,
    run: () => `Commands: ${Object.values(commands).map((c) => c.usage).join(", ")}`,
  },
  roll: {
    usage: "!roll [max]",
    hidden: false,
    run: ({ sender, args, random }) => {
      const requested = args[0] !== undefined ? parseInt(args[0], 10) : DEFAULT_ROLL;
      const max = Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_ROLL) : DEFAULT_ROLL;
      const points = Math.floor(random() * max) + 1;
      return `${sender.name} rolls ${points} point(s)`;
    },
  },
  who: {
    usage: "!who",
    hidden: true,
    run: ({ channel }) => `Members of ${channel.name}: ${channel.members.map((m) => m.name).join(", ")}`,
  },
};

export function isCommand(text: string): boolean {
  return text.startsWith("!") && text.length > 1;
}

/** Run a `!command` line typed into `channel` */
export function runCommand(
  text: string,
  sender: ChannelMember,
  channel: Channel,
  random: () => number = Math.random
): CommandResult {
  const [head = "", ...args] = text.slice(1).trim().split(/\s+/);
  const name = head.toLowerCase();
  const command = Object.hasOwn(commands, name) ? commands[name] : undefined;

  if (!command) {
    return { hidden: true, response: `Unknown command: !${name}` };
  }
  return { hidden: command.hidden, response: command.run({ sender, channel, args, random }) };
}

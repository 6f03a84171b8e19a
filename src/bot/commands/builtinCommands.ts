import { CommandRegistry } from './commandRegistry.js';
import { EchoCommand } from './echoCommand.js';
import { HelpCommand } from './helpCommand.js';
import { PingCommand } from './pingCommand.js';
import { MembersCommand, StatsCommand } from './statsCommand.js';
import type { UserLookup } from './statsCommand.js';
import { StatusCommand } from './statusCommand.js';
import { WhoamiCommand } from './whoamiCommand.js';

export function createCommandRegistry(users: UserLookup, prefixes?: readonly string[]): CommandRegistry {
  const registry = new CommandRegistry();
  const defaults = { prefixes };
  registry.registerCommand(new PingCommand(), defaults);
  registry.registerCommand(new EchoCommand(), defaults);
  registry.registerCommand(new WhoamiCommand(), defaults);
  registry.registerCommand(new StatusCommand(), defaults);
  registry.registerCommand(new StatsCommand(users), defaults);
  registry.registerCommand(new MembersCommand(users), defaults);
  registry.registerCommand(new HelpCommand(registry), defaults);
  return registry;
}

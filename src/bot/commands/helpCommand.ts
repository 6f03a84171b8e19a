import { commandLabel } from '../../commands/commandSyntax.js';
import type { ChatCommand, CommandBinding, CommandRegistry } from './commandRegistry.js';
import { permitsScope } from './commandRegistry.js';
import type { Envelope } from './envelope.js';
import { chunkLines } from './formatUtils.js';

const MAX_REPLY_LENGTH = 350;

export class HelpCommand implements ChatCommand {
  name = 'help';
  aliases = ['commands'];
  description = 'List available commands, or show details for one.';
  category = 'utility';

  constructor(private readonly registry: CommandRegistry) {}

  async execute(envelope: Envelope, params: string[]): Promise<void> {
    const bindings = Array.from(this.registry.allBindings()).filter((binding) =>
      permitsScope(binding, envelope.conversationKind),
    );

    if (!bindings.length) {
      await envelope.send('No commands are currently registered.');
      return;
    }

    const target = params[0]?.trim();
    if (target) {
      const match = bindings.find((binding) => binding.triggers.includes(target));
      if (!match) {
        await envelope.send(
          `Unknown command "${target}". Use ${commandLabel(this.name)} to list available commands.`,
        );
        return;
      }
      await envelope.send(formatBindingDetails(match));
      return;
    }

    const lines = bindings.map((binding) => formatBindingSummary(binding));
    for (const chunk of chunkLines(['Commands:', ...lines], MAX_REPLY_LENGTH)) {
      await envelope.send(chunk);
    }
  }
}

function displayPrefix(binding: CommandBinding): string {
  return binding.prefixes.find((prefix) => prefix !== '') ?? '';
}

function formatBindingSummary(binding: CommandBinding): string {
  const [name, ...aliases] = binding.triggers;
  const prefix = displayPrefix(binding);
  const aliasText = aliases.length
    ? ` aliases: ${aliases.map((alias) => `${prefix}${alias}`).join(', ')}`
    : '';
  const description = binding.description ?? 'No description provided.';
  return `  ${prefix}${name}${aliasText} - ${description}`;
}

function formatBindingDetails(binding: CommandBinding): string {
  const [name, ...aliases] = binding.triggers;
  const prefixes = binding.prefixes.map((prefix) => (prefix ? `"${prefix}"` : '(none)'));
  return [
    `Command: ${displayPrefix(binding)}${name}`,
    `Aliases: ${aliases.length ? aliases.join(', ') : 'None'}`,
    `Prefixes: ${prefixes.join(', ')}`,
    `Scope: ${binding.scopes.size ? Array.from(binding.scopes).join(', ') : 'anywhere'}`,
    `Description: ${binding.description ?? 'No description provided.'}`,
  ].join('\n');
}

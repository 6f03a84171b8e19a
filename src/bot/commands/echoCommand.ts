import { usageText } from '../../commands/commandSyntax.js';
import type { ChatCommand } from './commandRegistry.js';
import type { Envelope } from './envelope.js';

export class EchoCommand implements ChatCommand {
  name = 'echo';
  aliases = ['say'];
  description = 'Repeat the given text back.';
  category = 'utility';

  async execute(envelope: Envelope, params: string[]): Promise<void> {
    const text = params.join(' ').trim();
    if (!text) {
      await envelope.send(usageText(this.name, 'text'));
      return;
    }
    await envelope.send(text);
  }
}

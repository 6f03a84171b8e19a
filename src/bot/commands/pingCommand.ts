import type { ChatCommand } from './commandRegistry.js';
import type { Envelope } from './envelope.js';

export class PingCommand implements ChatCommand {
  name = 'ping';
  description = 'Simple latency test.';
  category = 'utility';

  async execute(envelope: Envelope): Promise<void> {
    await envelope.send('Pong!');
  }
}

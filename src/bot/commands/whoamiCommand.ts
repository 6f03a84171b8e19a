import type { ChatCommand } from './commandRegistry.js';
import type { Envelope } from './envelope.js';

const KIND_LABELS = {
  direct: 'direct chat',
  group: 'group',
  channel: 'guild channel',
} as const;

export class WhoamiCommand implements ChatCommand {
  name = 'whoami';
  description = 'Show your user id, where you are talking from, and your avatar.';
  category = 'utility';

  async execute(envelope: Envelope): Promise<void> {
    const lines = [
      `User: ${envelope.senderId}`,
      `Conversation: ${KIND_LABELS[envelope.conversationKind]}`,
    ];
    if (envelope.avatarUrl) {
      lines.push(`Avatar: ${envelope.avatarUrl}`);
    }
    await envelope.send(lines.join('\n'));
  }
}

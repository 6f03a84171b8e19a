import type { UserRecord } from '../../storage/userStore.js';
import type { ChatCommand } from './commandRegistry.js';
import type { ConversationKind, Envelope } from './envelope.js';
import { pluralize } from './formatUtils.js';

export interface UserLookup {
  getUser(kind: ConversationKind, openid: string): UserRecord | undefined;
  listConversationUsers(kind: ConversationKind, conversationId: string): UserRecord[];
}

export class StatsCommand implements ChatCommand {
  name = 'stats';
  description = 'Show how many messages you have sent to the bot.';
  category = 'users';

  constructor(private readonly users: UserLookup) {}

  async execute(envelope: Envelope): Promise<void> {
    const record = this.users.getUser(envelope.conversationKind, envelope.senderId);
    if (!record) {
      await envelope.send('No messages recorded for you yet.');
      return;
    }
    await envelope.send(
      `You have sent ${pluralize(record.messageCount, 'message')} since ${record.firstSeen.slice(0, 10)}.`,
    );
  }
}

export class MembersCommand implements ChatCommand {
  name = 'members';
  description = 'List the members of this group who have used the bot.';
  category = 'users';
  limitation = ['group'];

  constructor(
    private readonly users: UserLookup,
    private readonly maxListed = 10,
  ) {}

  async execute(envelope: Envelope): Promise<void> {
    const conversationId = envelope.conversationId;
    if (!conversationId) {
      await envelope.send('This group could not be identified.');
      return;
    }
    const members = this.users
      .listConversationUsers('group', conversationId)
      .sort((a, b) => b.messageCount - a.messageCount);
    if (!members.length) {
      await envelope.send('Nobody in this group has used the bot yet.');
      return;
    }

    const shown = members.slice(0, this.maxListed);
    const lines = shown.map(
      (member, idx) => `${idx + 1}. ${member.openid} (${pluralize(member.messageCount, 'message')})`,
    );
    const hidden = members.length - shown.length;
    if (hidden > 0) {
      lines.push(`...and ${hidden} more`);
    }
    await envelope.send([`Members who used the bot: ${members.length}`, ...lines].join('\n'));
  }
}

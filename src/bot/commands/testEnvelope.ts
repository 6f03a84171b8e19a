import { createEnvelope } from './envelope.js';
import type { ConversationKind, Envelope } from './envelope.js';

export interface RecordingEnvelope {
  envelope: Envelope;
  sent: string[];
}

export function makeEnvelope(
  rawText: string,
  conversationKind: ConversationKind = 'group',
  extra: { senderId?: string; conversationId?: string; avatarUrl?: string } = {},
): RecordingEnvelope {
  const sent: string[] = [];
  const envelope = createEnvelope({
    rawText,
    conversationKind,
    senderId: extra.senderId ?? 'user-1',
    conversationId: extra.conversationId ?? 'conv-1',
    avatarUrl: extra.avatarUrl,
    send: async (text: string) => {
      sent.push(text);
    },
  });
  return { envelope, sent };
}

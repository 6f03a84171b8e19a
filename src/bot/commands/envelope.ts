export type ConversationKind = 'direct' | 'group' | 'channel';

export const CONVERSATION_KINDS: readonly ConversationKind[] = ['direct', 'group', 'channel'];

export type MediaKind = 'image' | 'video' | 'voice';

/**
 * Normalized view of one inbound chat message. One envelope is built per
 * event and dropped once the dispatch for it settles.
 */
export interface Envelope {
  readonly rawText: string;
  readonly conversationKind: ConversationKind;
  readonly senderId: string;
  /** Group openid, guild channel id, or the sender's openid for direct chats. */
  readonly conversationId?: string;
  readonly messageId?: string;
  readonly timestamp?: string;
  readonly avatarUrl?: string;
  send(text: string): Promise<void>;
  sendMedia?(kind: MediaKind, url: string, caption?: string): Promise<void>;
}

export function createEnvelope(init: Envelope): Envelope {
  const envelope: Envelope = {
    rawText: init.rawText,
    conversationKind: init.conversationKind,
    senderId: init.senderId,
    conversationId: init.conversationId,
    messageId: init.messageId,
    timestamp: init.timestamp,
    avatarUrl: init.avatarUrl,
    send: init.send,
    sendMedia: init.sendMedia,
  };
  return Object.freeze(envelope);
}

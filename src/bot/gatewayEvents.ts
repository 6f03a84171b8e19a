import { createEnvelope } from './commands/envelope.js';
import type { ConversationKind, Envelope, MediaKind } from './commands/envelope.js';
import { ContentTypeError, EmptyContentError } from './commands/errors.js';

export const AVATAR_URL_TEMPLATE = 'https://thirdqq.qlogo.cn/qqapp/{appId}/{openid}/{size}';
export const DEFAULT_AVATAR_SIZE = 640;

const EVENT_KINDS: Record<string, ConversationKind> = {
  AT_MESSAGE_CREATE: 'channel',
  MESSAGE_CREATE: 'channel',
  GROUP_AT_MESSAGE_CREATE: 'group',
  C2C_MESSAGE_CREATE: 'direct',
};

export interface InboundMessage {
  kind: ConversationKind;
  id: string;
  content: string;
  senderId: string;
  /** Guild channel id, group openid, or the sender openid for direct chats. */
  conversationId: string;
  guildId?: string;
  timestamp?: string;
  authorAvatar?: string;
  isBot: boolean;
}

/** Where a reply goes; the gateway client owns the transport. */
export interface OutboundSender {
  sendText(message: InboundMessage, text: string): Promise<void>;
  sendMedia(message: InboundMessage, kind: MediaKind, url: string, caption?: string): Promise<void>;
}

export function isMessageEvent(eventType?: string | null): boolean {
  return !!eventType && Object.prototype.hasOwnProperty.call(EVENT_KINDS, eventType);
}

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Payload | undefined {
  return isPayload(value) ? value : undefined;
}

function readString(source: Payload | undefined, key: string): string | undefined {
  const value = source?.[key];
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function parseMessageEvent(eventType: string, data: unknown): InboundMessage {
  const kind = EVENT_KINDS[eventType];
  if (!kind) {
    throw new ContentTypeError(`Unsupported message event: ${eventType}`);
  }
  const payload = asRecord(data);
  const author = asRecord(payload?.author);
  const id = readString(payload, 'id');
  if (!payload || !id) {
    throw new ContentTypeError(`Malformed ${eventType} payload: missing message id`);
  }

  // Each event type names its sender and conversation differently.
  let senderId: string | undefined;
  let conversationId: string | undefined;
  if (kind === 'channel') {
    senderId = readString(author, 'id');
    conversationId = readString(payload, 'channel_id');
  } else if (kind === 'group') {
    senderId = readString(author, 'member_openid');
    conversationId = readString(payload, 'group_openid');
  } else {
    senderId = readString(author, 'user_openid');
    conversationId = senderId;
  }
  if (!senderId || !conversationId) {
    throw new ContentTypeError(`Malformed ${eventType} payload: missing sender or conversation`);
  }

  const content = payload.content;
  return {
    kind,
    id,
    content: typeof content === 'string' ? content.trim() : '',
    senderId,
    conversationId,
    guildId: readString(payload, 'guild_id'),
    timestamp: readString(payload, 'timestamp'),
    authorAvatar: readString(author, 'avatar'),
    isBot: author?.bot === true,
  };
}

export function avatarUrl(
  message: InboundMessage,
  appId: string,
  size = DEFAULT_AVATAR_SIZE,
): string | undefined {
  if (message.kind === 'channel') {
    return message.authorAvatar;
  }
  return AVATAR_URL_TEMPLATE.replace('{appId}', encodeURIComponent(appId))
    .replace('{openid}', encodeURIComponent(message.senderId))
    .replace('{size}', String(size));
}

export function toEnvelope(
  message: InboundMessage,
  outbound: OutboundSender,
  appId: string,
): Envelope {
  return createEnvelope({
    rawText: message.content,
    conversationKind: message.kind,
    senderId: message.senderId,
    conversationId: message.conversationId,
    messageId: message.id,
    timestamp: message.timestamp,
    avatarUrl: avatarUrl(message, appId),
    send: async (text: string) => {
      if (!text || !text.trim()) {
        throw new EmptyContentError();
      }
      await outbound.sendText(message, text);
    },
    sendMedia: async (kind: MediaKind, url: string, caption?: string) => {
      await outbound.sendMedia(message, kind, url, caption);
    },
  });
}

export const GatewayOp = {
  DISPATCH: 0,
  HEARTBEAT: 1,
  IDENTIFY: 2,
  RESUME: 6,
  RECONNECT: 7,
  INVALID_SESSION: 9,
  HELLO: 10,
  HEARTBEAT_ACK: 11,
} as const;

export type IntentName = 'guild' | 'guild_messages' | 'group' | 'c2c';

// 'guild' delivers AT_MESSAGE_CREATE; 'guild_messages' delivers every
// MESSAGE_CREATE and is only granted to private bots. Group and direct
// chats are delivered under the same intent bit.
const INTENT_BITS: Record<IntentName, number> = {
  guild: 1 << 30,
  guild_messages: 1 << 9,
  group: 1 << 25,
  c2c: 1 << 25,
};

export function intentMask(intents: readonly IntentName[]): number {
  return intents.reduce((mask, intent) => mask | INTENT_BITS[intent], 0);
}

export interface GatewayPayload {
  op: number;
  d?: unknown;
  s?: number;
  t?: string;
}

export function parseGatewayPayload(raw: string): GatewayPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isPayload(parsed)) return null;
  const { op, d, s, t } = parsed;
  if (typeof op !== 'number') return null;
  return {
    op,
    d,
    s: typeof s === 'number' ? s : undefined,
    t: typeof t === 'string' ? t : undefined,
  };
}

export function heartbeatInterval(data: unknown): number | null {
  const value: unknown = asRecord(data)?.heartbeat_interval;
  return typeof value === 'number' && value > 0 ? value : null;
}

export function readySessionId(data: unknown): string | undefined {
  return readString(asRecord(data), 'session_id');
}

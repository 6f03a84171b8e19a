import fs from 'node:fs';
import path from 'node:path';

import { CONVERSATION_KINDS } from '../bot/commands/envelope.js';
import type { ConversationKind, Envelope } from '../bot/commands/envelope.js';

export interface UserRecord {
  openid: string;
  kind: ConversationKind;
  messageCount: number;
  /** Last group or guild channel the user spoke in; absent for direct chats. */
  conversationId?: string;
  firstSeen: string;
}

type UserMap = Record<string, UserRecord>;

const DATA_DIR = path.resolve('data');
const DEFAULT_FILE_PATH = path.join(DATA_DIR, 'users.json');
const DEFAULT_FLUSH_DELAY_MS = 5000;

export interface UserStoreOptions {
  /** Delay before recorded messages are written out; 0 writes on every message. */
  flushDelayMs?: number;
}

function userKey(kind: ConversationKind, openid: string): string {
  return `${kind}:${openid}`;
}

function toRecord(value: unknown): UserRecord | null {
  if (!value || typeof value !== 'object') return null;
  const openid = Reflect.get(value, 'openid');
  const rawKind = Reflect.get(value, 'kind');
  const kind = CONVERSATION_KINDS.find((entry) => entry === rawKind);
  const messageCount = Number(Reflect.get(value, 'messageCount'));
  const conversationId = Reflect.get(value, 'conversationId');
  const firstSeen = Reflect.get(value, 'firstSeen');
  if (typeof openid !== 'string' || !openid || !kind || !Number.isFinite(messageCount)) {
    return null;
  }
  return {
    openid,
    kind,
    messageCount,
    conversationId: typeof conversationId === 'string' ? conversationId : undefined,
    firstSeen: typeof firstSeen === 'string' ? firstSeen : new Date(0).toISOString(),
  };
}

export class UserStore {
  private cache: UserMap;
  private readonly flushDelayMs: number;
  private flushTimer?: NodeJS.Timeout;
  private dirty = false;

  constructor(
    private readonly filePath: string = DEFAULT_FILE_PATH,
    options: UserStoreOptions = {},
  ) {
    this.flushDelayMs = Math.max(0, options.flushDelayMs ?? DEFAULT_FLUSH_DELAY_MS);
    this.cache = this.loadFromDisk();
  }

  recordMessage(envelope: Envelope, now = new Date()): UserRecord {
    const key = userKey(envelope.conversationKind, envelope.senderId);
    const conversationId =
      envelope.conversationKind === 'direct' ? undefined : envelope.conversationId;
    const existing = this.cache[key];
    const record: UserRecord = existing
      ? {
          ...existing,
          messageCount: existing.messageCount + 1,
          conversationId: conversationId ?? existing.conversationId,
        }
      : {
          openid: envelope.senderId,
          kind: envelope.conversationKind,
          messageCount: 1,
          conversationId,
          firstSeen: now.toISOString(),
        };
    this.cache[key] = record;
    this.scheduleFlush();
    return { ...record };
  }

  getUser(kind: ConversationKind, openid: string): UserRecord | undefined {
    const record = this.cache[userKey(kind, openid)];
    return record ? { ...record } : undefined;
  }

  listConversationUsers(kind: ConversationKind, conversationId: string): UserRecord[] {
    return Object.values(this.cache)
      .filter((record) => record.kind === kind && record.conversationId === conversationId)
      .map((record) => ({ ...record }));
  }

  clear(): void {
    this.cache = {};
    this.flush(true);
  }

  /** Writes pending records now. */
  flush(force = false): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
    if (this.dirty || force) {
      this.persist();
    }
  }

  private scheduleFlush(): void {
    this.dirty = true;
    if (!this.flushDelayMs) {
      this.persist();
      return;
    }
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = undefined;
      this.persist();
    }, this.flushDelayMs);
    this.flushTimer.unref();
  }

  private loadFromDisk(): UserMap {
    try {
      if (!fs.existsSync(this.filePath)) {
        return {};
      }
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) return {};
      const map: UserMap = {};
      for (const entry of parsed) {
        const record = toRecord(entry);
        if (record) {
          map[userKey(record.kind, record.openid)] = record;
        }
      }
      return map;
    } catch (err) {
      console.error(`Failed to read ${path.basename(this.filePath)}:`, err);
      return {};
    }
  }

  private persist(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(Object.values(this.cache), null, 2));
      this.dirty = false;
    } catch (err) {
      console.error(`Failed to write ${path.basename(this.filePath)}:`, err);
    }
  }
}

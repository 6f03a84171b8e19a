import dotenv from 'dotenv';

import { MAX_HANDLER_TIMEOUT_MS } from '../bot/commands/commandDispatcher.js';
import type { IntentName } from '../bot/gatewayEvents.js';
import { parsePrefixList } from '../commands/commandSyntax.js';

dotenv.config();

const INTENT_NAMES: readonly IntentName[] = ['guild', 'guild_messages', 'group', 'c2c'];
const DEFAULT_INTENTS: readonly IntentName[] = ['guild', 'group', 'c2c'];
const DEFAULT_HANDLER_TIMEOUT_MS = 15000;

export interface EnvConfig {
  appId: string;
  appSecret: string;
  sandbox: boolean;
  intents: IntentName[];
  prefixes: string[];
  handlerTimeoutMs: number;
  replyOnError: boolean;
  logChatEvents: boolean;
  debugDispatch: boolean;
}

type EnvSource = Record<string, string | undefined>;

function requireEnv(name: string, value?: string | null): string {
  if (!value || !value.trim()) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value.trim();
}

function parseBool(value: string | undefined | null, fallback = false): boolean {
  if (!value || !value.trim()) return fallback;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

function parseIntents(raw?: string | null): IntentName[] {
  if (!raw || !raw.trim()) return [...DEFAULT_INTENTS];
  const intents: IntentName[] = [];
  for (const entry of raw.split(',')) {
    const normalized = entry.trim().toLowerCase();
    if (!normalized) continue;
    const intent = INTENT_NAMES.find((name) => name === normalized);
    if (!intent) {
      throw new Error(`Unknown intent in BOT_INTENTS: ${entry.trim()}`);
    }
    if (!intents.includes(intent)) intents.push(intent);
  }
  return intents.length ? intents : [...DEFAULT_INTENTS];
}

function parseTimeout(raw?: string | null): number {
  if (!raw || !raw.trim()) return DEFAULT_HANDLER_TIMEOUT_MS;
  const value = Number(raw.trim());
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`BOT_HANDLER_TIMEOUT_MS must be a non-negative number, got: ${raw}`);
  }
  if (value > MAX_HANDLER_TIMEOUT_MS) {
    throw new Error(`BOT_HANDLER_TIMEOUT_MS must be at most ${MAX_HANDLER_TIMEOUT_MS}, got: ${raw}`);
  }
  return Math.floor(value);
}

export function loadEnv(env: EnvSource = process.env): EnvConfig {
  return {
    appId: requireEnv('BOT_APP_ID', env.BOT_APP_ID),
    appSecret: requireEnv('BOT_APP_SECRET', env.BOT_APP_SECRET),
    sandbox: parseBool(env.BOT_SANDBOX),
    intents: parseIntents(env.BOT_INTENTS),
    prefixes: parsePrefixList(env.BOT_PREFIXES),
    handlerTimeoutMs: parseTimeout(env.BOT_HANDLER_TIMEOUT_MS),
    replyOnError: parseBool(env.BOT_REPLY_ON_ERROR, true),
    logChatEvents: parseBool(env.LOG_CHAT_EVENTS),
    debugDispatch: parseBool(env.DEBUG_DISPATCH),
  };
}

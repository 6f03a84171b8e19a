import type { ConversationKind } from '../bot/commands/envelope.js';
import { InvalidConfigurationError } from '../bot/commands/errors.js';

export const PRIMARY_COMMAND_PREFIX = '/';
export const DEFAULT_COMMAND_PREFIXES: readonly string[] = [PRIMARY_COMMAND_PREFIX, ''];

// Placeholder used in env lists, where an empty entry would be dropped.
export const EMPTY_PREFIX_TOKEN = '<empty>';

export const SCOPE_TOKENS = {
  channel: 'channel',
  group: 'group',
  c2c: 'direct',
} as const satisfies Record<string, ConversationKind>;

export type ScopeToken = keyof typeof SCOPE_TOKENS;

export function isScopeToken(value: string): value is ScopeToken {
  return Object.prototype.hasOwnProperty.call(SCOPE_TOKENS, value);
}

export function parseScopeTokens(tokens: readonly string[]): Set<ConversationKind> {
  const scopes = new Set<ConversationKind>();
  for (const token of tokens) {
    const normalized = token.trim().toLowerCase();
    if (!isScopeToken(normalized)) {
      throw new InvalidConfigurationError(
        `Unknown scope "${token}". Expected one of: ${Object.keys(SCOPE_TOKENS).join(', ')}.`,
      );
    }
    scopes.add(SCOPE_TOKENS[normalized]);
  }
  return scopes;
}

export function parsePrefixList(raw?: string | null): string[] {
  if (!raw || !raw.trim()) return [...DEFAULT_COMMAND_PREFIXES];
  const prefixes = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => (entry === EMPTY_PREFIX_TOKEN ? '' : entry));
  return prefixes.length ? Array.from(new Set(prefixes)) : [...DEFAULT_COMMAND_PREFIXES];
}

export function commandLabel(name: string): string {
  return `${PRIMARY_COMMAND_PREFIX}${name.trim()}`;
}

export function usageText(name: string, args?: string): string {
  const suffix = args?.trim() ? ` ${args.trim()}` : '';
  return `Usage: ${commandLabel(name)}${suffix}`;
}

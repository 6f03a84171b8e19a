import type { CommandBinding, CommandRegistry } from './commandRegistry.js';
import { permitsScope } from './commandRegistry.js';
import type { Envelope } from './envelope.js';

export type MatchResult =
  | {
      kind: 'matched';
      binding: CommandBinding;
      prefix: string;
      trigger: string;
      params: string[];
    }
  | {
      kind: 'scope-rejected';
      binding: CommandBinding;
      prefix: string;
      trigger: string;
    }
  | { kind: 'no-match' };

export interface ParsedInvocation {
  trigger: string;
  params: string[];
}

export function splitInvocation(text: string, prefix: string): ParsedInvocation | null {
  if (!text.startsWith(prefix)) return null;
  const withoutPrefix = text.slice(prefix.length).trim();
  if (!withoutPrefix) return null;
  const [trigger, ...params] = withoutPrefix.split(/\s+/);
  return { trigger, params };
}

/**
 * Prefixes are tried longest first so the empty prefix never shadows a
 * real one. Under one (prefix, trigger) the first binding in registration
 * order whose scope admits the envelope wins; a scope miss is remembered
 * and the scan goes on through the remaining prefixes.
 */
export function matchCommand(envelope: Envelope, registry: CommandRegistry): MatchResult {
  const text = envelope.rawText.trim();
  if (!text) return { kind: 'no-match' };

  let rejected: { binding: CommandBinding; prefix: string; trigger: string } | null = null;

  for (const prefix of registry.prefixes()) {
    const invocation = splitInvocation(text, prefix);
    if (!invocation) continue;

    for (const binding of registry.lookup(prefix, invocation.trigger)) {
      if (permitsScope(binding, envelope.conversationKind)) {
        return {
          kind: 'matched',
          binding,
          prefix,
          trigger: invocation.trigger,
          params: invocation.params,
        };
      }
      if (!rejected) rejected = { binding, prefix, trigger: invocation.trigger };
    }
  }

  if (rejected) {
    return { kind: 'scope-rejected', ...rejected };
  }
  return { kind: 'no-match' };
}

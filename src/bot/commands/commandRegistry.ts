import { DEFAULT_COMMAND_PREFIXES, parseScopeTokens } from '../../commands/commandSyntax.js';
import type { ConversationKind, Envelope } from './envelope.js';
import { DuplicateBindingError, InvalidConfigurationError } from './errors.js';

export type CommandHandler = (envelope: Envelope, params: string[]) => Promise<void>;

export interface CommandBinding {
  readonly triggers: readonly string[];
  readonly prefixes: readonly string[];
  /** Empty means the command runs in every conversation kind. */
  readonly scopes: ReadonlySet<ConversationKind>;
  readonly handler: CommandHandler;
  readonly description?: string;
  readonly category?: string;
}

export interface BindOptions {
  prefixes?: readonly string[];
  /** Scope tokens: 'channel', 'group' or 'c2c'. */
  limitation?: readonly string[];
  description?: string;
  category?: string;
}

export interface ChatCommand {
  name: string;
  aliases?: string[];
  description?: string;
  category?: string;
  prefixes?: readonly string[];
  limitation?: readonly string[];
  execute(envelope: Envelope, params: string[]): Promise<void>;
}

export interface BindingInit {
  triggers: readonly string[];
  prefixes?: readonly string[];
  scopes?: Iterable<ConversationKind>;
  handler: CommandHandler;
  description?: string;
  category?: string;
}

export function scopesOverlap(
  a: ReadonlySet<ConversationKind>,
  b: ReadonlySet<ConversationKind>,
): boolean {
  if (a.size === 0 || b.size === 0) return true;
  for (const scope of a) {
    if (b.has(scope)) return true;
  }
  return false;
}

export function permitsScope(binding: CommandBinding, kind: ConversationKind): boolean {
  return binding.scopes.size === 0 || binding.scopes.has(kind);
}

export class CommandRegistry {
  private bindings: CommandBinding[] = [];
  private readonly byKey = new Map<string, readonly CommandBinding[]>();
  private orderedPrefixes: string[] = [];

  /**
   * Inserts a binding. Throws InvalidConfigurationError for a malformed
   * binding and DuplicateBindingError when a (prefix, trigger) pair is
   * already bound in an overlapping scope; either way nothing is inserted.
   */
  register(init: BindingInit): CommandBinding {
    const binding = normalizeBinding(init);
    this.assertUnbound(binding, []);
    this.insert([binding]);
    return binding;
  }

  bind(
    triggers: string | readonly string[],
    handler: CommandHandler,
    options: BindOptions = {},
  ): CommandBinding {
    return this.register({
      triggers: typeof triggers === 'string' ? [triggers] : triggers,
      prefixes: options.prefixes,
      scopes: parseScopeTokens(options.limitation ?? []),
      handler,
      description: options.description,
      category: options.category,
    });
  }

  registerCommand(command: ChatCommand, defaults: BindOptions = {}): CommandBinding {
    return this.bind(
      [command.name, ...(command.aliases ?? [])],
      (envelope, params) => command.execute(envelope, params),
      {
        prefixes: command.prefixes ?? defaults.prefixes,
        limitation: command.limitation ?? defaults.limitation,
        description: command.description ?? defaults.description,
        category: command.category ?? defaults.category,
      },
    );
  }

  /**
   * Folds the bindings of other registries into this one, in order. The
   * whole fold is checked before anything is inserted, so a collision
   * leaves this registry as it was.
   */
  include(...registries: CommandRegistry[]): void {
    const incoming: CommandBinding[] = [];
    for (const registry of registries) {
      if (registry === this) continue;
      for (const binding of registry.allBindings()) {
        const copy = normalizeBinding(binding);
        this.assertUnbound(copy, incoming);
        incoming.push(copy);
      }
    }
    this.insert(incoming);
  }

  allBindings(): IterableIterator<CommandBinding> {
    return this.bindings[Symbol.iterator]();
  }

  lookup(prefix: string, trigger: string): readonly CommandBinding[] {
    return this.byKey.get(bindingKey(prefix, trigger)) ?? [];
  }

  /** Distinct prefixes, longest first; equal lengths keep registration order. */
  prefixes(): readonly string[] {
    return this.orderedPrefixes;
  }

  get size(): number {
    return this.bindings.length;
  }

  private assertUnbound(binding: CommandBinding, pending: readonly CommandBinding[]): void {
    for (const prefix of binding.prefixes) {
      for (const trigger of binding.triggers) {
        const taken = [
          ...this.lookup(prefix, trigger),
          ...pending.filter(
            (other) => other.prefixes.includes(prefix) && other.triggers.includes(trigger),
          ),
        ];
        if (taken.some((other) => scopesOverlap(other.scopes, binding.scopes))) {
          throw new DuplicateBindingError(prefix, trigger);
        }
      }
    }
  }

  private insert(bindings: readonly CommandBinding[]): void {
    if (!bindings.length) return;
    // Replace rather than mutate so snapshots handed out earlier stay stable.
    this.bindings = [...this.bindings, ...bindings];
    for (const binding of bindings) {
      for (const prefix of binding.prefixes) {
        for (const trigger of binding.triggers) {
          const key = bindingKey(prefix, trigger);
          this.byKey.set(key, [...(this.byKey.get(key) ?? []), binding]);
        }
      }
    }
    this.orderedPrefixes = orderPrefixes(this.bindings);
  }
}

function normalizeBinding(init: BindingInit): CommandBinding {
  const triggers = Array.from(new Set(init.triggers));
  if (!triggers.length) {
    throw new InvalidConfigurationError('A command needs at least one trigger name.');
  }
  for (const trigger of triggers) {
    if (!trigger || /\s/.test(trigger)) {
      throw new InvalidConfigurationError(
        `Invalid trigger "${trigger}": triggers must be non-empty and contain no whitespace.`,
      );
    }
  }

  const prefixes = Array.from(new Set(init.prefixes ?? DEFAULT_COMMAND_PREFIXES));
  if (!prefixes.length) {
    throw new InvalidConfigurationError(`Command "${triggers[0]}" needs at least one prefix.`);
  }

  return Object.freeze({
    triggers: Object.freeze(triggers),
    prefixes: Object.freeze(prefixes),
    scopes: new Set(init.scopes ?? []),
    handler: init.handler,
    description: init.description,
    category: init.category,
  });
}

function orderPrefixes(bindings: readonly CommandBinding[]): string[] {
  const seen = new Set<string>();
  for (const binding of bindings) {
    for (const prefix of binding.prefixes) {
      seen.add(prefix);
    }
  }
  // Array#sort is stable, so equal lengths keep first-seen order.
  return Array.from(seen).sort((a, b) => b.length - a.length);
}

function bindingKey(prefix: string, trigger: string): string {
  return `${prefix}\u0000${trigger}`;
}

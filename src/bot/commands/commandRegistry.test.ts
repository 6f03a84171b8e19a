import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { CommandRegistry, scopesOverlap } from './commandRegistry.js';
import type { ChatCommand } from './commandRegistry.js';
import type { ConversationKind } from './envelope.js';
import { DuplicateBindingError, InvalidConfigurationError } from './errors.js';
import { makeEnvelope } from './testEnvelope.js';

const noop = async () => {};

describe('CommandRegistry.bind', () => {
  it('defaults to the slash and empty prefixes with no scope restriction', () => {
    const registry = new CommandRegistry();
    const binding = registry.bind('echo', noop);

    assert.deepEqual(binding.triggers, ['echo']);
    assert.deepEqual(binding.prefixes, ['/', '']);
    assert.equal(binding.scopes.size, 0);
    assert.deepEqual(registry.lookup('/', 'echo'), [binding]);
    assert.deepEqual(registry.lookup('', 'echo'), [binding]);
  });

  it('maps scope tokens onto conversation kinds', () => {
    const registry = new CommandRegistry();
    const binding = registry.bind('ping', noop, { limitation: ['c2c', 'channel'] });

    assert.deepEqual(Array.from(binding.scopes), ['direct', 'channel']);
  });

  it('rejects an unknown scope token without touching the registry', () => {
    const registry = new CommandRegistry();

    assert.throws(
      () => registry.bind('ping', noop, { limitation: ['guild'] }),
      InvalidConfigurationError,
    );
    assert.equal(registry.size, 0);
    assert.deepEqual(registry.prefixes(), []);
  });

  it('rejects empty trigger sets, blank triggers and empty prefix lists', () => {
    const registry = new CommandRegistry();

    assert.throws(() => registry.bind([], noop), InvalidConfigurationError);
    assert.throws(() => registry.bind('', noop), InvalidConfigurationError);
    assert.throws(() => registry.bind('two words', noop), InvalidConfigurationError);
    assert.throws(() => registry.bind('ping', noop, { prefixes: [] }), InvalidConfigurationError);
    assert.equal(registry.size, 0);
  });

  it('accepts the same trigger in disjoint scopes', () => {
    const registry = new CommandRegistry();
    const group = registry.bind('ping', noop, { limitation: ['group'] });
    const direct = registry.bind('ping', noop, { limitation: ['c2c'] });

    assert.deepEqual(registry.lookup('/', 'ping'), [group, direct]);
  });

  it('rejects the same prefix and trigger in overlapping scopes', () => {
    const registry = new CommandRegistry();
    registry.bind('ping', noop, { limitation: ['group', 'channel'] });

    assert.throws(
      () => registry.bind('ping', noop, { limitation: ['channel'] }),
      DuplicateBindingError,
    );
    assert.throws(() => registry.bind('ping', noop), DuplicateBindingError);
    assert.equal(registry.size, 1);
  });

  it('rejects a scoped binding over an unrestricted one', () => {
    const registry = new CommandRegistry();
    registry.bind('ping', noop);

    assert.throws(
      () => registry.bind('ping', noop, { limitation: ['group'] }),
      (err: unknown) =>
        err instanceof DuplicateBindingError && err.prefix === '/' && err.trigger === 'ping',
    );
  });

  it('allows the same trigger under different prefixes', () => {
    const registry = new CommandRegistry();
    registry.bind('ping', noop, { prefixes: ['/'] });
    registry.bind('ping', noop, { prefixes: ['!'] });

    assert.equal(registry.size, 2);
  });

  it('inserts nothing when any trigger of a binding collides', () => {
    const registry = new CommandRegistry();
    registry.bind(['roll', 'dice'], noop, { prefixes: ['/'] });

    assert.throws(
      () => registry.bind(['coin', 'dice'], noop, { prefixes: ['/'] }),
      DuplicateBindingError,
    );
    assert.deepEqual(registry.lookup('/', 'coin'), []);
    assert.equal(registry.size, 1);
  });
});

describe('CommandRegistry snapshots and ordering', () => {
  it('returns a fresh snapshot on every allBindings call', () => {
    const registry = new CommandRegistry();
    const first = registry.bind('a', noop);
    const snapshot = registry.allBindings();
    const second = registry.bind('b', noop);

    assert.deepEqual(Array.from(snapshot), [first]);
    assert.deepEqual(Array.from(registry.allBindings()), [first, second]);
  });

  it('orders prefixes longest first, keeping registration order on ties', () => {
    const registry = new CommandRegistry();
    registry.bind('a', noop, { prefixes: ['#'] });
    registry.bind('b', noop, { prefixes: ['/', ''] });
    registry.bind('c', noop, { prefixes: ['>>'] });

    assert.deepEqual(registry.prefixes(), ['>>', '#', '/', '']);
  });

  it('freezes registered bindings', () => {
    const registry = new CommandRegistry();
    const binding = registry.bind('a', noop);

    assert.ok(Object.isFrozen(binding));
    assert.ok(Object.isFrozen(binding.triggers));
  });
});

describe('CommandRegistry.registerCommand', () => {
  it('binds the name and aliases of a command object', async () => {
    const calls: string[][] = [];
    const command: ChatCommand = {
      name: 'roll',
      aliases: ['dice'],
      description: 'Roll a die.',
      limitation: ['group'],
      async execute(_envelope, params) {
        calls.push(params);
      },
    };
    const registry = new CommandRegistry();
    const binding = registry.registerCommand(command, { prefixes: ['!'], category: 'fun' });

    assert.deepEqual(binding.triggers, ['roll', 'dice']);
    assert.deepEqual(binding.prefixes, ['!']);
    assert.deepEqual(Array.from(binding.scopes), ['group']);
    assert.equal(binding.description, 'Roll a die.');
    assert.equal(binding.category, 'fun');
    assert.deepEqual(registry.lookup('!', 'dice'), [binding]);

    await binding.handler(makeEnvelope('!dice 6').envelope, ['6']);
    assert.deepEqual(calls, [['6']]);
  });
});

describe('CommandRegistry.include', () => {
  it('folds other registries in order', () => {
    const base = new CommandRegistry();
    const extra = new CommandRegistry();
    const ping = base.bind('ping', noop);
    const echo = extra.bind('echo', noop, { limitation: ['group'] });

    base.include(extra);

    const triggers = Array.from(base.allBindings()).map((binding) => binding.triggers[0]);
    assert.deepEqual(triggers, ['ping', 'echo']);
    assert.equal(base.lookup('/', 'ping')[0], ping);
    assert.deepEqual(Array.from(base.lookup('', 'echo')[0].scopes), Array.from(echo.scopes));
  });

  it('applies the duplicate rules to included bindings', () => {
    const base = new CommandRegistry();
    const extra = new CommandRegistry();
    base.bind('ping', noop);
    extra.bind('ping', noop, { prefixes: ['/'] });

    assert.throws(() => base.include(extra), DuplicateBindingError);
  });

  it('leaves the registry untouched when a later included binding collides', () => {
    const base = new CommandRegistry();
    const extra = new CommandRegistry();
    const ping = base.bind('ping', noop);
    extra.bind('echo', noop);
    extra.bind('ping', noop, { prefixes: ['/'] });

    assert.throws(() => base.include(extra), DuplicateBindingError);
    assert.equal(base.size, 1);
    assert.deepEqual(base.lookup('/', 'echo'), []);
    assert.deepEqual(base.lookup('/', 'ping'), [ping]);
    assert.deepEqual(base.prefixes(), ['/', '']);
  });

  it('checks included registries against each other', () => {
    const base = new CommandRegistry();
    const first = new CommandRegistry();
    const second = new CommandRegistry();
    first.bind('roll', noop, { limitation: ['group'] });
    second.bind('roll', noop, { limitation: ['group', 'c2c'] });

    assert.throws(() => base.include(first, second), DuplicateBindingError);
    assert.equal(base.size, 0);
    assert.deepEqual(base.prefixes(), []);
  });
});

describe('scopesOverlap', () => {
  it('treats an empty scope set as overlapping everything', () => {
    const none = new Set<ConversationKind>();
    const group = new Set<ConversationKind>(['group']);
    const direct = new Set<ConversationKind>(['direct']);
    const groupAndChannel = new Set<ConversationKind>(['group', 'channel']);
    const channel = new Set<ConversationKind>(['channel']);

    assert.equal(scopesOverlap(none, group), true);
    assert.equal(scopesOverlap(group, direct), false);
    assert.equal(scopesOverlap(groupAndChannel, channel), true);
  });
});

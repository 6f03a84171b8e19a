import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { CommandRegistry } from './commandRegistry.js';
import { HelpCommand } from './helpCommand.js';
import { PingCommand } from './pingCommand.js';
import { MembersCommand } from './statsCommand.js';
import { makeEnvelope } from './testEnvelope.js';

const noUsers = {
  getUser: () => undefined,
  listConversationUsers: () => [],
};

function buildRegistry(): { registry: CommandRegistry; help: HelpCommand } {
  const registry = new CommandRegistry();
  const help = new HelpCommand(registry);
  registry.registerCommand(new PingCommand());
  registry.registerCommand(new MembersCommand(noUsers));
  registry.registerCommand(help);
  return { registry, help };
}

describe('HelpCommand', () => {
  it('lists the commands usable in the current conversation', async () => {
    const { help } = buildRegistry();
    const { envelope, sent } = makeEnvelope('/help', 'direct');

    await help.execute(envelope, []);

    assert.deepEqual(sent, [
      [
        'Commands:',
        '  /ping - Simple latency test.',
        '  /help aliases: /commands - List available commands, or show details for one.',
      ].join('\n'),
    ]);
  });

  it('includes group-only commands inside a group', async () => {
    const { help } = buildRegistry();
    const { envelope, sent } = makeEnvelope('/help', 'group');

    await help.execute(envelope, []);

    assert.equal(sent.length, 1);
    assert.ok(sent[0].includes('\n  /members - List the members of this group who have used the bot.\n'));
  });

  it('shows details for one command', async () => {
    const { help } = buildRegistry();
    const { envelope, sent } = makeEnvelope('/help ping', 'direct');

    await help.execute(envelope, ['ping']);

    assert.deepEqual(sent, [
      'Command: /ping\nAliases: None\nPrefixes: "/", (none)\nScope: anywhere\nDescription: Simple latency test.',
    ]);
  });

  it('shows the scope of a restricted command', async () => {
    const { help } = buildRegistry();
    const { envelope, sent } = makeEnvelope('/help members', 'group');

    await help.execute(envelope, ['members']);

    assert.equal(sent[0].split('\n')[3], 'Scope: group');
  });

  it('treats commands outside the current scope as unknown', async () => {
    const { help } = buildRegistry();
    const { envelope, sent } = makeEnvelope('/help members', 'direct');

    await help.execute(envelope, ['members']);

    assert.deepEqual(sent, ['Unknown command "members". Use /help to list available commands.']);
  });

  it('splits long listings into several replies', async () => {
    const registry = new CommandRegistry();
    const help = new HelpCommand(registry);
    const description = 'x'.repeat(100);
    for (let idx = 0; idx < 6; idx += 1) {
      registry.bind(`cmd${idx}`, async () => {}, { description });
    }
    const { envelope, sent } = makeEnvelope('/help', 'group');

    await help.execute(envelope, []);

    assert.equal(sent.length, 2);
    assert.ok(sent.every((chunk) => chunk.length <= 350));
    assert.equal(sent[0].split('\n').length, 4);
    assert.ok(sent[1].startsWith(`  /cmd3 - ${description}\n`));
  });
});

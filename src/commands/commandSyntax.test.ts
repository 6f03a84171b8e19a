import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { InvalidConfigurationError } from '../bot/commands/errors.js';
import { commandLabel, parsePrefixList, parseScopeTokens, usageText } from './commandSyntax.js';

describe('parseScopeTokens', () => {
  it('maps channel, group and c2c tokens to conversation kinds', () => {
    assert.deepEqual(Array.from(parseScopeTokens(['c2c', 'GROUP', ' channel '])), [
      'direct',
      'group',
      'channel',
    ]);
  });

  it('returns an empty set for no tokens', () => {
    assert.equal(parseScopeTokens([]).size, 0);
  });

  it('rejects tokens outside the closed set', () => {
    assert.throws(
      () => parseScopeTokens(['group', 'direct']),
      (err: unknown) =>
        err instanceof InvalidConfigurationError &&
        err.code === 100 &&
        err.message === 'Error code: 100\nUnknown scope "direct". Expected one of: channel, group, c2c.',
    );
  });
});

describe('parsePrefixList', () => {
  it('falls back to the slash and empty prefixes', () => {
    assert.deepEqual(parsePrefixList(undefined), ['/', '']);
    assert.deepEqual(parsePrefixList(' , '), ['/', '']);
  });

  it('reads the empty-prefix placeholder and drops repeats', () => {
    assert.deepEqual(parsePrefixList('!, <empty>, !'), ['!', '']);
  });
});

describe('usageText', () => {
  it('prefixes the command with the primary prefix', () => {
    assert.equal(commandLabel(' echo '), '/echo');
    assert.equal(usageText('echo', 'text'), 'Usage: /echo text');
    assert.equal(usageText('ping'), 'Usage: /ping');
  });
});

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { EchoCommand } from './echoCommand.js';
import { PingCommand } from './pingCommand.js';
import { WhoamiCommand } from './whoamiCommand.js';
import { formatStatus } from './statusCommand.js';
import { makeEnvelope } from './testEnvelope.js';

describe('EchoCommand', () => {
  it('repeats its params joined by single spaces', async () => {
    const { envelope, sent } = makeEnvelope('/echo hello   world');

    await new EchoCommand().execute(envelope, ['hello', 'world']);

    assert.deepEqual(sent, ['hello world']);
  });

  it('replies with usage when there is nothing to echo', async () => {
    const { envelope, sent } = makeEnvelope('/echo');

    await new EchoCommand().execute(envelope, []);

    assert.deepEqual(sent, ['Usage: /echo text']);
  });
});

describe('PingCommand', () => {
  it('answers pong', async () => {
    const { envelope, sent } = makeEnvelope('/ping');

    await new PingCommand().execute(envelope);

    assert.deepEqual(sent, ['Pong!']);
  });
});

describe('WhoamiCommand', () => {
  it('describes the sender and includes the avatar when known', async () => {
    const { envelope, sent } = makeEnvelope('/whoami', 'group', {
      senderId: 'member-7',
      avatarUrl: 'https://example.test/avatar.png',
    });

    await new WhoamiCommand().execute(envelope);

    assert.deepEqual(sent, [
      'User: member-7\nConversation: group\nAvatar: https://example.test/avatar.png',
    ]);
  });

  it('omits the avatar line when none is known', async () => {
    const { envelope, sent } = makeEnvelope('/whoami', 'direct', { senderId: 'user-9' });

    await new WhoamiCommand().execute(envelope);

    assert.deepEqual(sent, ['User: user-9\nConversation: direct chat']);
  });
});

describe('formatStatus', () => {
  it('formats uptime, load, memory and date', () => {
    const text = formatStatus({
      uptimeSeconds: 3725,
      loadAverage: 1,
      cpuCount: 4,
      memoryUsedRatio: 0.5,
      now: new Date(2024, 4, 3, 12, 0, 0),
    });

    assert.equal(text, 'Uptime: 1h 2m 5s\nCPU load: 25.0%\nMemory: 50.0%\nDate: 2024-05-03');
  });

  it('caps the load ratio at 100%', () => {
    const text = formatStatus({
      uptimeSeconds: 42,
      loadAverage: 12,
      cpuCount: 2,
      memoryUsedRatio: 0.125,
      now: new Date(2024, 0, 9),
    });

    assert.equal(text, 'Uptime: 42s\nCPU load: 100.0%\nMemory: 12.5%\nDate: 2024-01-09');
  });
});

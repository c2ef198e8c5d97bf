import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { Collection, type Client } from 'discord.js';

jest.mock('../../../logger', () => ({
  createLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    http: jest.fn(),
  }),
}));

type MockPlayerStatus = 'idle' | 'buffering' | 'playing' | 'paused';

class MockVolume {
  volume = 1;

  setVolume(value: number): void {
    this.volume = value;
  }
}

class MockResource {
  readonly volume = new MockVolume();

  constructor(readonly metadata: unknown) {}
}

interface MockPlayerState {
  status: MockPlayerStatus;
  resource?: MockResource;
}

/** Audio player that only reaches `playing` when the test says audio flows */
class MockAudioPlayer extends EventEmitter {
  state: MockPlayerState = { status: 'idle' };
  readonly calls: string[] = [];

  play(resource: MockResource): void {
    this.calls.push('play');
    this.moveTo({ status: 'buffering', resource });
  }

  pause(): boolean {
    this.calls.push('pause');
    if (this.state.status !== 'playing') return false;
    this.moveTo({ ...this.state, status: 'paused' });
    return true;
  }

  unpause(): boolean {
    this.calls.push('unpause');
    if (this.state.status !== 'paused') return false;
    this.moveTo({ ...this.state, status: 'playing' });
    return true;
  }

  stop(): boolean {
    this.calls.push('stop');
    this.moveTo({ status: 'idle' });
    return true;
  }

  startAudio(): void {
    this.moveTo({ ...this.state, status: 'playing' });
  }

  private moveTo(next: MockPlayerState): void {
    const previous = this.state;
    this.state = next;
    this.emit('stateChange', previous, next);
  }
}

class MockConnection extends EventEmitter {
  state = { status: 'ready' };
  readonly subscribe = jest.fn();

  destroy(): void {
    this.state = { status: 'destroyed' };
    this.emit('destroyed');
  }
}

let mockPlayer: MockAudioPlayer | null = null;

const mockPlayDl = {
  stream: jest.fn(async (_url: string, _options: { quality: number }) => ({
    stream: Readable.from([]),
    type: 'webm/opus',
  })),
};

jest.mock('@discordjs/voice', () => ({
  joinVoiceChannel: () => new MockConnection(),
  createAudioPlayer: () => {
    mockPlayer = new MockAudioPlayer();
    return mockPlayer;
  },
  createAudioResource: (_stream: unknown, options: { metadata: unknown }) =>
    new MockResource(options.metadata),
  entersState: async () => undefined,
  AudioPlayerStatus: {
    Idle: 'idle',
    Buffering: 'buffering',
    Playing: 'playing',
    Paused: 'paused',
    AutoPaused: 'autopaused',
  },
  NoSubscriberBehavior: { Pause: 'pause' },
  StreamType: {
    Arbitrary: 'arbitrary',
    OggOpus: 'ogg/opus',
    WebmOpus: 'webm/opus',
    Opus: 'opus',
    Raw: 'raw',
  },
  VoiceConnectionStatus: {
    Signalling: 'signalling',
    Connecting: 'connecting',
    Ready: 'ready',
    Disconnected: 'disconnected',
    Destroyed: 'destroyed',
  },
}));

jest.mock('play-dl', () => ({ __esModule: true, default: mockPlayDl }));

import { Broadcaster } from '../../Broadcaster';
import { MediaResolver } from '../../resolver/MediaResolver';
import { Session } from '../../Session';
import { FakeBackend, deferred } from '../../__tests__/fakes';
import { DiscordVoiceTransport } from '../DiscordVoiceTransport';

const VIDEO_URL = 'https://www.youtube.com/watch?v=abcdefghijk';

function createClient(): Client {
  const members = new Collection<string, { user: { bot: boolean } }>([
    ['u1', { user: { bot: false } }],
    ['b1', { user: { bot: true } }],
  ]);
  const lounge = { id: 'vc-1', name: 'Lounge', members, isVoiceBased: () => true };
  const general = { id: 'tc-1', name: 'general', isVoiceBased: () => false };
  const guild = {
    id: 'g1',
    name: 'Test Guild',
    voiceAdapterCreator: () => ({}),
    channels: {
      cache: new Collection<string, object>([
        ['vc-1', lounge],
        ['tc-1', general],
      ]),
    },
  };
  return { guilds: { cache: new Collection([['g1', guild]]) } } as unknown as Client;
}

function player(): MockAudioPlayer {
  if (!mockPlayer) throw new Error('No audio player yet');
  return mockPlayer;
}

async function joinedSession(): Promise<Session> {
  const session = new Session({
    tenantId: 'g1',
    resolver: new MediaResolver({ backend: new FakeBackend(), backoffMs: 0 }),
    transport: new DiscordVoiceTransport(createClient()),
    broadcaster: new Broadcaster(),
  });
  await session.join('vc-1');
  return session;
}

describe('DiscordVoiceTransport', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockPlayer = null;
  });

  it('lists guilds and their voice channels', () => {
    const transport = new DiscordVoiceTransport(createClient());

    expect(transport.listTenants()).toEqual([{ id: 'g1', name: 'Test Guild' }]);
    expect(transport.tenantName('g1')).toBe('Test Guild');
    expect(transport.voiceChannels('g1')).toEqual([{ id: 'vc-1', name: 'Lounge', memberCount: 1 }]);
    expect(transport.voiceChannels('g2')).toEqual([]);
  });

  it('rejects joining a channel that is not voice based', async () => {
    const transport = new DiscordVoiceTransport(createClient());

    await expect(transport.join('g1', 'tc-1', { timeoutMs: 100 })).rejects.toThrow(
      'Channel tc-1 is not a voice channel'
    );
  });

  it('starts audio at the session volume', async () => {
    const session = await joinedSession();

    await session.play(VIDEO_URL);
    await session.settled();

    expect(mockPlayDl.stream).toHaveBeenCalledWith(VIDEO_URL, { quality: 2 });
    expect(player().state).toMatchObject({ status: 'buffering' });
    expect(player().state.resource?.volume.volume).toBe(1);
    await session.dispose();
  });

  it('applies volume and pause requested while the stream is opening', async () => {
    const session = await joinedSession();
    const opening = deferred<{ stream: Readable; type: string }>();
    mockPlayDl.stream.mockImplementationOnce(() => opening.promise);

    await session.play(VIDEO_URL);
    await session.setVolume(30);
    await session.pause();
    opening.resolve({ stream: Readable.from([]), type: 'webm/opus' });
    await session.settled();
    player().startAudio();

    expect(player().state.status).toBe('paused');
    expect(player().state.resource?.volume.volume).toBe(0.3);
    expect(session.snapshot()).toMatchObject({ state: 'paused', volume: 30 });
    await session.dispose();
  });

  it('keeps playing when a pause is undone before the stream opens', async () => {
    const session = await joinedSession();
    const opening = deferred<{ stream: Readable; type: string }>();
    mockPlayDl.stream.mockImplementationOnce(() => opening.promise);

    await session.play(VIDEO_URL);
    await session.pause();
    await session.resume();
    opening.resolve({ stream: Readable.from([]), type: 'webm/opus' });
    await session.settled();
    player().startAudio();

    expect(player().state.status).toBe('playing');
    expect(session.snapshot().state).toBe('playing');
    await session.dispose();
  });

  it('resumes a paused player immediately once audio flows', async () => {
    const session = await joinedSession();
    await session.play(VIDEO_URL);
    await session.settled();
    player().startAudio();

    await session.pause();
    expect(player().state.status).toBe('paused');
    await session.resume();

    expect(player().state.status).toBe('playing');
    await session.dispose();
  });
});

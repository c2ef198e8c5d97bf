import type { PlaybackState } from '../../types/voice';
import { StateError } from '../errors';

export type PlaybackTrigger =
  | 'join'
  | 'connected'
  | 'connectFailed'
  | 'play'
  | 'advance'
  | 'finish'
  | 'pause'
  | 'resume'
  | 'stop'
  | 'idleTimeout'
  | 'disconnect';

interface Transition {
  from: readonly PlaybackState[];
  to: PlaybackState;
  /** Message for the StateError thrown when the trigger is not allowed */
  rejection: string;
}

const TRANSITIONS: Record<PlaybackTrigger, Transition> = {
  join: { from: ['disconnected'], to: 'connecting', rejection: 'Already connected' },
  connected: { from: ['connecting'], to: 'idle', rejection: 'Not connecting' },
  connectFailed: { from: ['connecting'], to: 'disconnected', rejection: 'Not connecting' },
  play: { from: ['idle'], to: 'playing', rejection: 'Cannot start playback' },
  advance: { from: ['playing', 'paused'], to: 'playing', rejection: 'Nothing is playing' },
  finish: { from: ['playing', 'paused'], to: 'idle', rejection: 'Nothing is playing' },
  pause: { from: ['playing'], to: 'paused', rejection: 'Nothing is playing' },
  resume: { from: ['paused'], to: 'playing', rejection: 'Playback is not paused' },
  stop: { from: ['idle', 'playing', 'paused'], to: 'idle', rejection: 'Not connected to voice' },
  idleTimeout: { from: ['idle'], to: 'disconnected', rejection: 'Session is not idle' },
  disconnect: {
    from: ['connecting', 'idle', 'playing', 'paused'],
    to: 'disconnected',
    rejection: 'Already disconnected',
  },
};

export type StateChangeListener = (
  from: PlaybackState,
  to: PlaybackState,
  trigger: PlaybackTrigger
) => void;

/**
 * Playback state for one session.
 *
 * disconnected -> connecting -> idle <-> playing <-> paused, with stop,
 * idle-timeout and disconnect as the ways back down.
 */
export class PlaybackStateMachine {
  private current: PlaybackState = 'disconnected';
  private readonly listeners = new Set<StateChangeListener>();

  get state(): PlaybackState {
    return this.current;
  }

  get isConnected(): boolean {
    return this.current !== 'disconnected' && this.current !== 'connecting';
  }

  get isActive(): boolean {
    return this.current === 'playing' || this.current === 'paused';
  }

  can(trigger: PlaybackTrigger): boolean {
    return TRANSITIONS[trigger].from.includes(this.current);
  }

  /**
   * Throw StateError unless `trigger` is allowed from the current state
   */
  assert(trigger: PlaybackTrigger): void {
    if (!this.can(trigger)) {
      throw new StateError(TRANSITIONS[trigger].rejection, { state: this.current, trigger });
    }
  }

  /**
   * Apply `trigger` and return the new state
   */
  transition(trigger: PlaybackTrigger): PlaybackState {
    this.assert(trigger);
    const from = this.current;
    const to = TRANSITIONS[trigger].to;
    this.current = to;
    for (const listener of this.listeners) {
      listener(from, to, trigger);
    }
    return to;
  }

  onChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

import { StateError } from '../../errors';
import { PlaybackStateMachine, type PlaybackTrigger } from '../PlaybackStateMachine';

function machineIn(...triggers: PlaybackTrigger[]): PlaybackStateMachine {
  const machine = new PlaybackStateMachine();
  for (const trigger of triggers) {
    machine.transition(trigger);
  }
  return machine;
}

describe('PlaybackStateMachine', () => {
  it('starts disconnected', () => {
    const machine = new PlaybackStateMachine();

    expect(machine.state).toBe('disconnected');
    expect(machine.isConnected).toBe(false);
    expect(machine.isActive).toBe(false);
  });

  it('walks the happy path', () => {
    const machine = new PlaybackStateMachine();

    expect(machine.transition('join')).toBe('connecting');
    expect(machine.isConnected).toBe(false);
    expect(machine.transition('connected')).toBe('idle');
    expect(machine.isConnected).toBe(true);
    expect(machine.transition('play')).toBe('playing');
    expect(machine.transition('pause')).toBe('paused');
    expect(machine.isActive).toBe(true);
    expect(machine.transition('resume')).toBe('playing');
    expect(machine.transition('advance')).toBe('playing');
    expect(machine.transition('finish')).toBe('idle');
    expect(machine.transition('idleTimeout')).toBe('disconnected');
  });

  it('returns to disconnected when a join fails', () => {
    expect(machineIn('join', 'connectFailed').state).toBe('disconnected');
  });

  it.each<[PlaybackTrigger[]]>([
    [['join', 'connected']],
    [['join', 'connected', 'play']],
    [['join', 'connected', 'play', 'pause']],
  ])('stops to idle from %p', (path) => {
    const machine = machineIn(...path);
    expect(machine.transition('stop')).toBe('idle');
  });

  it('disconnects from every connected state', () => {
    expect(machineIn('join').transition('disconnect')).toBe('disconnected');
    expect(machineIn('join', 'connected', 'play', 'pause').transition('disconnect')).toBe(
      'disconnected'
    );
  });

  it('rejects invalid triggers with StateError and keeps the state', () => {
    const machine = machineIn('join', 'connected');

    expect(() => machine.transition('pause')).toThrow(StateError);
    expect(() => machine.transition('resume')).toThrow('Playback is not paused');
    expect(() => machine.transition('join')).toThrow('Already connected');
    expect(machine.state).toBe('idle');
  });

  it('rejects skip and stop while disconnected', () => {
    const machine = new PlaybackStateMachine();

    expect(() => machine.assert('advance')).toThrow('Nothing is playing');
    expect(() => machine.assert('stop')).toThrow('Not connected to voice');
    expect(machine.can('disconnect')).toBe(false);
  });

  it('includes the state and trigger in the error details', () => {
    try {
      new PlaybackStateMachine().assert('play');
      throw new Error('expected a StateError');
    } catch (err) {
      expect(err).toBeInstanceOf(StateError);
      if (err instanceof StateError) {
        expect(err.details).toEqual({ state: 'disconnected', trigger: 'play' });
      }
    }
  });

  it('notifies listeners until they unsubscribe', () => {
    const machine = new PlaybackStateMachine();
    const listener = jest.fn();
    const unsubscribe = machine.onChange(listener);

    machine.transition('join');
    unsubscribe();
    machine.transition('connected');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('disconnected', 'connecting', 'join');
  });
});

/**
 * BroadcastNotifier tests.
 */

import { describe, expect, it, vi } from 'vitest';
import type { StateBroadcastPayload } from '../../../src/events/event-emitter.js';
import { DispatchEventEmitter } from '../../../src/events/event-emitter.js';
import { BufferedLineSink } from '../../../src/io/line-io.js';
import { BroadcastNotifier, HOURS_PER_DAY } from '../../../src/observer/broadcast-notifier.js';
import { RecordingObserver } from '../../../src/observer/participants.js';
import { DuplicateParticipantError } from '../../../src/types/errors.js';
import type { StateReceiver } from '../../../src/types/participant.js';

describe('BroadcastNotifier', () => {
  describe('advance', () => {
    it('starts at hour 0', () => {
      expect(new BroadcastNotifier().hour).toBe(0);
    });

    it('notifies every participant in registration order', () => {
      const sink = new BufferedLineSink();
      const clock = new BroadcastNotifier();
      clock.register(new RecordingObserver('Amy', sink));
      clock.register(new RecordingObserver('Bob', sink));

      clock.advance();
      clock.advance();
      clock.advance();

      expect(sink.lines).toEqual(['Amy 1', 'Bob 1', 'Amy 2', 'Bob 2', 'Amy 3', 'Bob 3']);
    });

    it('returns the new hour', () => {
      const clock = new BroadcastNotifier();

      expect(clock.advance()).toBe(1);
      expect(clock.advance()).toBe(2);
    });

    it.each([0, 1, 23, 24, 25, 48, 100])('is at N mod 24 after %i advances', (n) => {
      const clock = new BroadcastNotifier();
      for (let i = 0; i < n; i++) {
        clock.advance();
      }

      expect(clock.hour).toBe(n % HOURS_PER_DAY);
    });

    it('wraps from 23 to 0 and tells participants', () => {
      const observer = new RecordingObserver('Amy');
      const clock = new BroadcastNotifier();
      for (let i = 0; i < 23; i++) {
        clock.advance();
      }
      clock.register(observer);

      clock.advance();

      expect(observer.received).toEqual([0]);
      expect(observer.lastHour).toBe(0);
    });

    it('is a no-op dispatch with no participants', () => {
      const clock = new BroadcastNotifier();

      expect(() => clock.advance()).not.toThrow();
      expect(clock.hour).toBe(1);
    });

    it('dispatches through the participant contract', () => {
      const receivesState = vi.fn();
      const participant: StateReceiver = { name: 'probe', receivesState };
      const clock = new BroadcastNotifier();
      clock.register(participant);

      clock.advance();
      clock.advance();

      expect(receivesState.mock.calls).toEqual([[1], [2]]);
    });
  });

  describe('register / unregister', () => {
    it('stops notifying an unregistered participant', () => {
      const sink = new BufferedLineSink();
      const amy = new RecordingObserver('Amy', sink);
      const clock = new BroadcastNotifier();
      clock.register(amy);
      clock.register(new RecordingObserver('Bob', sink));

      clock.advance();
      expect(clock.unregister(amy)).toBe(true);
      clock.advance();

      expect(sink.lines).toEqual(['Amy 1', 'Bob 1', 'Bob 2']);
    });

    it('unregisters by name and ignores unknown names', () => {
      const clock = new BroadcastNotifier();
      clock.register(new RecordingObserver('Amy'));

      expect(clock.unregister('Nobody')).toBe(false);
      expect(clock.unregister('Amy')).toBe(true);
      expect(clock.participantCount).toBe(0);
    });

    it('rejects duplicate names by default', () => {
      const clock = new BroadcastNotifier();
      clock.register(new RecordingObserver('Amy'));

      expect(() => clock.register(new RecordingObserver('Amy'))).toThrow(DuplicateParticipantError);
    });

    it('replaces duplicates when configured to', () => {
      const first = new RecordingObserver('Amy');
      const second = new RecordingObserver('Amy');
      const clock = new BroadcastNotifier({ duplicatePolicy: 'replace' });
      clock.register(first);
      clock.register(second);

      clock.advance();

      expect(first.received).toEqual([]);
      expect(second.received).toEqual([1]);
      expect(clock.participants()).toEqual(['Amy']);
    });
  });

  describe('events', () => {
    it('publishes each broadcast with its recipients', () => {
      const events = new DispatchEventEmitter();
      const handler = vi.fn((_payload: StateBroadcastPayload) => {});
      events.on('state.broadcast', handler);

      const clock = new BroadcastNotifier({ events });
      clock.register(new RecordingObserver('Amy'));
      clock.register(new RecordingObserver('Bob'));
      clock.advance();

      expect(clock.events).toBe(events);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0]).toMatchObject({ hour: 1, recipients: ['Amy', 'Bob'] });
    });
  });
});

describe('RecordingObserver', () => {
  it('records hours without a sink', () => {
    const observer = new RecordingObserver('Amy');
    observer.receivesState(5);
    observer.receivesState(6);

    expect(observer.received).toEqual([5, 6]);
    expect(observer.lastHour).toBe(6);
  });

  it('has no last hour before the first notification', () => {
    expect(new RecordingObserver('Amy').lastHour).toBeUndefined();
  });
});

/**
 * ParticipantRegistry tests.
 *
 * Verifies registration order, duplicate policies, removal and events.
 */

import { describe, expect, it, vi } from 'vitest';
import { DispatchEventEmitter } from '../../../src/events/event-emitter.js';
import type { ParticipantEventPayload } from '../../../src/events/event-emitter.js';
import {
  ParticipantRegistry,
  type ParticipantRegistryOptions,
} from '../../../src/registry/participant-registry.js';
import { ErrorCode } from '../../../src/types/error-type.js';
import {
  DuplicateParticipantError,
  InvalidParticipantNameError,
} from '../../../src/types/errors.js';
import type { Participant } from '../../../src/types/participant.js';

interface Tagged extends Participant {
  tag: string;
}

const tagged = (name: string, tag = name.toLowerCase()): Tagged => ({ name, tag });

function newRegistry(options: Partial<ParticipantRegistryOptions> = {}) {
  return new ParticipantRegistry<Tagged>({ discipline: 'broadcast-notify', ...options });
}

describe('ParticipantRegistry', () => {
  describe('add', () => {
    it('keeps registration order', () => {
      const registry = newRegistry();
      for (const name of ['Zoe', 'Amy', 'Max', 'Bob']) {
        registry.add(tagged(name));
      }

      expect(registry.names()).toEqual(['Zoe', 'Amy', 'Max', 'Bob']);
      expect(registry.size).toBe(4);
    });

    it('rejects duplicate names by default', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));

      expect(() => registry.add(tagged('Amy', 'second'))).toThrow(DuplicateParticipantError);
      expect(registry.lookup('Amy')?.tag).toBe('amy');
      expect(registry.size).toBe(1);
    });

    it('reports the duplicate name on the error', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));

      try {
        registry.add(tagged('Amy'));
        expect.unreachable('add should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateParticipantError);
        if (error instanceof DuplicateParticipantError) {
          expect(error.participantName).toBe('Amy');
          expect(error.code).toBe(ErrorCode.DUPLICATE_PARTICIPANT);
          expect(error.message).toBe("Participant already registered: 'Amy'");
        }
      }
    });

    it('replaces in place under the replace policy', () => {
      const registry = newRegistry({ duplicatePolicy: 'replace' });
      registry.add(tagged('Amy'));
      registry.add(tagged('Bob'));
      registry.add(tagged('Amy', 'second'));

      expect(registry.names()).toEqual(['Amy', 'Bob']);
      expect(registry.lookup('Amy')?.tag).toBe('second');
    });

    it.each(['', ' ', 'two words', 'tab\there'])('rejects invalid name %j', (name) => {
      const registry = newRegistry();

      expect(() => registry.add(tagged(name))).toThrow(InvalidParticipantNameError);
      expect(registry.size).toBe(0);
    });
  });

  describe('remove', () => {
    it('removes a registered participant', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));
      registry.add(tagged('Bob'));

      expect(registry.remove('Amy')).toBe(true);
      expect(registry.names()).toEqual(['Bob']);
      expect(registry.lookup('Amy')).toBeUndefined();
    });

    it('is a no-op for unknown names', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));

      expect(registry.remove('Nobody')).toBe(false);
      expect(registry.names()).toEqual(['Amy']);
    });

    it('appends a re-added participant at the end', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));
      registry.add(tagged('Bob'));
      registry.remove('Amy');
      registry.add(tagged('Amy'));

      expect(registry.names()).toEqual(['Bob', 'Amy']);
    });
  });

  describe('forEach', () => {
    it('visits participants in registration order with their index', () => {
      const registry = newRegistry();
      registry.add(tagged('C'));
      registry.add(tagged('A'));
      registry.add(tagged('B'));

      const visited: string[] = [];
      registry.forEach((participant, index) => visited.push(`${index}:${participant.name}`));

      expect(visited).toEqual(['0:C', '1:A', '2:B']);
    });

    it('does nothing on an empty registry', () => {
      const fn = vi.fn();
      newRegistry().forEach(fn);

      expect(fn).not.toHaveBeenCalled();
    });

    it('iterates a snapshot when the callback mutates the registry', () => {
      const registry = newRegistry();
      registry.add(tagged('A'));
      registry.add(tagged('B'));

      const visited: string[] = [];
      registry.forEach((participant) => {
        visited.push(participant.name);
        if (participant.name === 'A') {
          registry.remove('B');
          registry.add(tagged('C'));
        }
      });

      expect(visited).toEqual(['A', 'B']);
      expect(registry.names()).toEqual(['A', 'C']);
    });
  });

  describe('lookup and introspection', () => {
    it('finds participants by name', () => {
      const registry = newRegistry();
      const amy = tagged('Amy');
      registry.add(amy);

      expect(registry.lookup('Amy')).toBe(amy);
      expect(registry.has('Amy')).toBe(true);
      expect(registry.has('amy')).toBe(false);
    });

    it('clear removes everything', () => {
      const registry = newRegistry();
      registry.add(tagged('Amy'));
      registry.add(tagged('Bob'));
      registry.clear();

      expect(registry.size).toBe(0);
      expect(registry.names()).toEqual([]);
    });

    it('debugInfo describes the registry', () => {
      const registry = newRegistry({ discipline: 'mediated-route' });
      registry.add(tagged('Amy'));

      expect(registry.debugInfo()).toEqual({
        discipline: 'mediated-route',
        duplicatePolicy: 'reject',
        size: 1,
        participants: ['Amy'],
      });
    });
  });

  describe('events', () => {
    it('publishes registration and removal', () => {
      const events = new DispatchEventEmitter();
      const registered = vi.fn((_payload: ParticipantEventPayload) => {});
      const removed = vi.fn((_payload: ParticipantEventPayload) => {});
      events.on('participant.registered', registered);
      events.on('participant.removed', removed);

      const registry = newRegistry({ events, duplicatePolicy: 'replace' });
      registry.add(tagged('Amy'));
      registry.add(tagged('Amy'));
      registry.remove('Amy');
      registry.remove('Amy');

      expect(registered).toHaveBeenCalledTimes(2);
      expect(registered.mock.calls[0][0]).toMatchObject({
        discipline: 'broadcast-notify',
        name: 'Amy',
        replaced: false,
      });
      expect(registered.mock.calls[1][0].replaced).toBe(true);
      expect(removed).toHaveBeenCalledTimes(1);
      expect(removed.mock.calls[0][0].name).toBe('Amy');
    });

    it('does not publish a rejected duplicate', () => {
      const events = new DispatchEventEmitter();
      const registered = vi.fn();
      events.on('participant.registered', registered);

      const registry = newRegistry({ events });
      registry.add(tagged('Amy'));
      expect(() => registry.add(tagged('Amy'))).toThrow();

      expect(registered).toHaveBeenCalledTimes(1);
    });
  });
});

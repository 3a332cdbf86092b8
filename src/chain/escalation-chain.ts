/**
 * Escalation chain: an ordered, immutable sequence of approval links.
 *
 * A request walks forward from the head and stops at the first link that
 * accepts it. When no link accepts, the terminal link denies it, so every
 * request on a non-empty chain ends in exactly one outcome.
 *
 * @example
 * ```typescript
 * const chain = EscalationChain.default(); // Supervisor 3, Manager 7, Director 10
 *
 * formatOutcome(chain.handle({ subjectName: 'Ann', magnitude: 5 }));
 * // "Ann Approved by Manager."
 * formatOutcome(chain.handle({ subjectName: 'Ann', magnitude: 15 }));
 * // "Ann Denied by Director."
 * ```
 */

import { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { EmptyChainError, MalformedInputError } from '../types/errors.js';
import type { ApprovalHandler, ChainRequest } from '../types/participant.js';

const log = createLogger({ component: 'escalation-chain' });

/**
 * Link definition: approves requests up to and including `capacity`.
 */
export interface LinkSpec {
  readonly capacity: number;
  readonly label: string;
}

export const DEFAULT_LINKS: readonly LinkSpec[] = [
  { capacity: 3, label: 'Supervisor' },
  { capacity: 7, label: 'Manager' },
  { capacity: 10, label: 'Director' },
];

/**
 * Link that approves any request no larger than its capacity.
 */
export class CapacityLink implements ApprovalHandler {
  readonly label: string;
  readonly capacity: number;

  /**
   * @throws MalformedInputError if capacity is not a non-negative integer
   */
  constructor(spec: LinkSpec) {
    if (!Number.isSafeInteger(spec.capacity) || spec.capacity < 0) {
      throw new MalformedInputError(
        `Link capacity must be a non-negative integer, got ${spec.capacity}`,
        String(spec.capacity)
      );
    }
    this.label = spec.label;
    this.capacity = spec.capacity;
  }

  canApprove(magnitude: number): boolean {
    return magnitude <= this.capacity;
  }
}

/**
 * Terminal state of a traversal: approved at `linkIndex`, or denied at the
 * terminal link.
 */
export interface ChainOutcome {
  status: 'approved' | 'denied';
  request: ChainRequest;
  label: string;
  linkIndex: number;
}

export class EscalationChain {
  readonly events: DispatchEventEmitter;

  private readonly handlers: readonly ApprovalHandler[];

  /**
   * @throws EmptyChainError when `handlers` is empty
   */
  constructor(handlers: readonly ApprovalHandler[], events?: DispatchEventEmitter) {
    if (handlers.length === 0) {
      throw new EmptyChainError();
    }
    this.handlers = Object.freeze([...handlers]);
    this.events = events ?? new DispatchEventEmitter();
  }

  /**
   * Build a chain of {@link CapacityLink}s, head first.
   */
  static fromLinks(specs: readonly LinkSpec[], events?: DispatchEventEmitter): EscalationChain {
    return new EscalationChain(
      specs.map((spec) => new CapacityLink(spec)),
      events
    );
  }

  /**
   * Three-tier chain: Supervisor (3), Manager (7), Director (10).
   */
  static default(events?: DispatchEventEmitter): EscalationChain {
    return EscalationChain.fromLinks(DEFAULT_LINKS, events);
  }

  /**
   * Route a request to the first link that accepts it.
   *
   * @throws MalformedInputError if the magnitude is not a non-negative integer
   */
  handle(request: ChainRequest): ChainOutcome {
    const { magnitude } = request;
    if (!Number.isSafeInteger(magnitude) || magnitude < 0) {
      throw new MalformedInputError(
        `Request magnitude must be a non-negative integer, got ${magnitude}`,
        String(magnitude)
      );
    }

    const linkIndex = this.handlers.findIndex((handler) => handler.canApprove(magnitude));
    if (linkIndex >= 0) {
      const { label } = this.handlers[linkIndex];
      log.trace('Request approved', { subject: request.subjectName, magnitude, label, linkIndex });
      this.events.emitRequestApproved(request, label, linkIndex);
      return { status: 'approved', request, label, linkIndex };
    }

    const terminalIndex = this.handlers.length - 1;
    const { label } = this.handlers[terminalIndex];
    log.trace('Request denied', { subject: request.subjectName, magnitude, label });
    this.events.emitRequestDenied(request, label, terminalIndex);
    return { status: 'denied', request, label, linkIndex: terminalIndex };
  }

  links(): readonly ApprovalHandler[] {
    return this.handlers;
  }

  get length(): number {
    return this.handlers.length;
  }

  /**
   * Labels head to terminal, e.g. "Supervisor -> Manager -> Director".
   */
  describe(): string {
    return this.handlers.map((handler) => handler.label).join(' -> ');
  }
}

/**
 * Render an outcome as `"<name> Approved by <label>."` or
 * `"<name> Denied by <label>."`.
 */
export function formatOutcome(outcome: ChainOutcome): string {
  const verb = outcome.status === 'approved' ? 'Approved' : 'Denied';
  return `${outcome.request.subjectName} ${verb} by ${outcome.label}.`;
}

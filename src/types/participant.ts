/**
 * Participant capability contracts.
 *
 * Each discipline defines the narrowest contract it dispatches through.
 * Concrete participants are plain values satisfying one of these
 * interfaces; there is no shared base class.
 */

/**
 * The four dispatch disciplines.
 */
export type Discipline =
  | 'broadcast-notify'
  | 'strategy-select'
  | 'mediated-route'
  | 'escalation-chain';

/**
 * Anything that can sit in a {@link ParticipantRegistry}.
 */
export interface Participant {
  /** Unique registry key */
  readonly name: string;
}

/**
 * Observer participant: receives a snapshot of the subject's state.
 */
export interface StateReceiver extends Participant {
  receivesState(hour: number): void;
}

/**
 * A message relayed through a {@link MediatedRouter}.
 */
export interface Message {
  readonly sender: string;
  readonly body: string;
}

/**
 * Mediator participant: receives messages sent by other participants.
 */
export interface MessageReceiver extends Participant {
  receivesMessage(sender: string, body: string): void;
}

/**
 * A request travelling down an escalation chain, e.g. a name and a
 * number of days of leave.
 */
export interface ChainRequest {
  readonly subjectName: string;
  readonly magnitude: number;
}

/**
 * Chain participant: one link of an escalation chain.
 */
export interface ApprovalHandler {
  /** Label reported in the outcome ("Supervisor", "Manager", ...) */
  readonly label: string;

  /** Whether this link accepts a request of the given size */
  canApprove(magnitude: number): boolean;
}

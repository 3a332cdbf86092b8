export {
  CapacityLink,
  type ChainOutcome,
  DEFAULT_LINKS,
  EscalationChain,
  formatOutcome,
  type LinkSpec,
} from './escalation-chain.js';

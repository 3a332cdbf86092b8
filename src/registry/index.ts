export {
  ParticipantRegistry,
  type ParticipantRegistryOptions,
} from './participant-registry.js';

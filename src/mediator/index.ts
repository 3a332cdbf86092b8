export { ChatParticipant } from './chat-participant.js';
export { MediatedRouter, type MediatedRouterOptions } from './mediated-router.js';

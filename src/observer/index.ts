export {
  BroadcastNotifier,
  type BroadcastNotifierOptions,
  HOURS_PER_DAY,
} from './broadcast-notifier.js';
export { RecordingObserver } from './participants.js';

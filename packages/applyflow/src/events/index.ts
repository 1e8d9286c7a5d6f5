export { EventLog, type EventListener, type EventLogOptions } from './EventLog.js';
export {
  APPLICATION_TRIGGERS,
  EVENT_CAUSES,
  TERMINAL_TRIGGERS,
  type ApplicationTrigger,
} from './ApplicationEventTypes.js';

export type {
  Tenant,
  Connected,
  ParameterValuesChanged,
  Notification,
  Detection,
  ChangeConnection,
  ChangeSource,
} from './types';
export { NotifyError, DetectionError, abortError, isAbortError, describeTenant, messageOf } from './errors';
export { HEARTBEAT_FRAME, CONNECTED_FRAME, dataFrame } from './frames';
export { SubscriberQueue, DEFAULT_QUEUE_CAPACITY } from './queue';
export type { Take } from './queue';
export { BroadcastHub } from './hub';
export type { BroadcastResult, HubOptions } from './hub';
export { ChangeDetector } from './detector';
export { DetectorRegistry } from './registry';
export { PollLoop, DEFAULT_POLL_INTERVAL_MS } from './poll-loop';
export type { PollObserver, PollLoopOptions } from './poll-loop';
export { StreamSession, DEFAULT_HEARTBEAT_MS } from './session';
export type { StreamTransport, SessionState, StreamSessionOptions } from './session';
export { sleep } from './timers';

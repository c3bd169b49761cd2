export { EventBus } from './event_bus';
export type { IEventStream, EventBusOptions } from './event_bus';
export type * from './types';

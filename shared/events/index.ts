export { EventBus } from './EventBus';
export type {
  EventHandler,
  EventOfType,
  GameEventBus,
  SubscriptionToken,
  TypedEvent,
} from './EventBus';
export type * from './types';

import { randomUUID } from 'crypto';

export type LifecycleEventType =
  | 'CUSTOMER_CREATED'
  | 'CUSTOMER_UPDATED'
  | 'CUSTOMER_DELETED';

export interface LifecycleEvent<TPayload = unknown> {
  readonly eventId: string;
  readonly eventType: LifecycleEventType;
  readonly entityType: string;
  readonly timestamp: string;
  readonly payload: TPayload;
}

export const createLifecycleEvent = <TPayload>(
  eventType: LifecycleEventType,
  entityType: string,
  payload: TPayload,
): LifecycleEvent<TPayload> =>
  Object.freeze({
    eventId: randomUUID(),
    eventType,
    entityType,
    timestamp: new Date().toISOString(),
    payload,
  });

import { createLifecycleEvent } from './lifecycle-event';

describe('createLifecycleEvent', () => {
  it('stamps a fresh id and timestamp', () => {
    const first = createLifecycleEvent('CUSTOMER_UPDATED', 'Customer', {});
    const second = createLifecycleEvent('CUSTOMER_UPDATED', 'Customer', {});

    expect(first.eventId).not.toBe(second.eventId);
    expect(Number.isNaN(Date.parse(first.timestamp))).toBe(false);
    expect(first.entityType).toBe('Customer');
  });

  it('is frozen once built', () => {
    const event = createLifecycleEvent('CUSTOMER_DELETED', 'Customer', {
      active: false,
    });
    expect(Object.isFrozen(event)).toBe(true);
  });
});

import { CustomerEventPublisher } from '../events/customer-event.publisher';
import { LifecycleEvent } from '../events/lifecycle-event';

export class RecordingEventPublisher extends CustomerEventPublisher {
  readonly published: { key: string; event: LifecycleEvent }[] = [];
  failWith?: Error;

  async publish(key: string, event: LifecycleEvent) {
    this.published.push({ key, event });
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

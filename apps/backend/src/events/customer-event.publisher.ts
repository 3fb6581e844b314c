import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { LifecycleEvent } from './lifecycle-event';

/**
 * Outbound channel for customer lifecycle events. Resolves once the send has
 * been acknowledged and rejects when it fails; nothing is retried.
 */
export abstract class CustomerEventPublisher {
  abstract publish(key: string, event: LifecycleEvent): Promise<void>;
}

@Injectable()
export class SnsCustomerEventPublisher extends CustomerEventPublisher {
  private readonly logger = new Logger(SnsCustomerEventPublisher.name);
  private readonly topicArn?: string;
  private readonly snsRegion: string;
  private readonly client: SNSClient;

  constructor(private readonly config: ConfigService) {
    super();
    this.topicArn = this.config.get<string>('CUSTOMER_EVENTS_TOPIC_ARN');
    const region =
      this.config.get<string>('AWS_REGION') ??
      this.config.get<string>('AWS_DEFAULT_REGION') ??
      'eu-west-1';
    this.snsRegion = this.resolveRegionFromArn(this.topicArn) ?? region;
    this.client = new SNSClient({ region: this.snsRegion });
  }

  async publish(key: string, event: LifecycleEvent) {
    if (!this.topicArn) {
      this.logger.warn(
        `CUSTOMER_EVENTS_TOPIC_ARN not configured; skipping ${event.eventType} for ${key}`,
      );
      return;
    }

    const fifo = this.topicArn.endsWith('.fifo');
    await this.client.send(
      new PublishCommand({
        TopicArn: this.topicArn,
        Subject: event.eventType,
        Message: JSON.stringify(event),
        MessageAttributes: {
          eventType: { DataType: 'String', StringValue: event.eventType },
          entityType: { DataType: 'String', StringValue: event.entityType },
          key: { DataType: 'String', StringValue: key },
        },
        MessageGroupId: fifo ? key : undefined,
        MessageDeduplicationId: fifo ? event.eventId : undefined,
      }),
    );
    this.logger.debug(
      `Event sent - topic: ${this.topicArn}, key: ${key}, type: ${event.eventType}`,
    );
  }

  private resolveRegionFromArn(arn?: string): string | undefined {
    if (!arn) {
      return undefined;
    }

    const parts = arn.split(':');
    if (parts.length < 4) {
      return undefined;
    }

    const region = parts[3];
    return region || undefined;
  }
}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  CustomerEventPublisher,
  SnsCustomerEventPublisher,
} from './customer-event.publisher';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CustomerEventPublisher,
      useClass: SnsCustomerEventPublisher,
    },
  ],
  exports: [CustomerEventPublisher],
})
export class EventsModule {}

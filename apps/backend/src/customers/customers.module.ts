import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DynamoConfigModule } from '../config/dynamo.config';
import { EventsModule } from '../events/events.module';
import { CustomersController } from './customers.controller';
import { CustomersService } from './customers.service';
import { CustomerRepository } from './customer.repository';
import { CustomerStore } from './customer.store';
import { CustomerValidator } from './customer.validator';
import { CustomerTypeCatalog } from './customer-type';

const premiumTypeCodes = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === 'string');
  }
  return typeof value === 'string' ? value.split(',') : ['VIP', 'PYME'];
};

@Module({
  imports: [ConfigModule, DynamoConfigModule, EventsModule],
  controllers: [CustomersController],
  providers: [
    CustomersService,
    CustomerValidator,
    {
      provide: CustomerStore,
      useClass: CustomerRepository,
    },
    {
      provide: CustomerTypeCatalog,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        CustomerTypeCatalog.fromCodes(
          premiumTypeCodes(config.get<unknown>('PREMIUM_CUSTOMER_TYPES')),
        ),
    },
  ],
  exports: [CustomersService],
})
export class CustomersModule {}

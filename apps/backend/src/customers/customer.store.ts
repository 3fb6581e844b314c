import { CustomerType } from './customer-type';
import {
  CustomerEntity,
  NewCustomerEntity,
} from './entities/customer.entity';

/**
 * Persistence seam for customer records. `save` is an upsert that assigns
 * `customerId` on the first write.
 */
export abstract class CustomerStore {
  abstract exists(documentNumber: string): Promise<boolean>;
  abstract get(customerId: string): Promise<CustomerEntity | undefined>;
  abstract getByDocumentNumber(
    documentNumber: string,
  ): Promise<CustomerEntity | undefined>;
  abstract list(): Promise<CustomerEntity[]>;
  abstract listByType(customerType: CustomerType): Promise<CustomerEntity[]>;
  abstract save(customer: NewCustomerEntity): Promise<CustomerEntity>;
  abstract deleteById(customerId: string): Promise<void>;
}

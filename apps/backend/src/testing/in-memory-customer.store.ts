import { CustomerStore } from '../customers/customer.store';
import { CustomerType } from '../customers/customer-type';
import {
  CustomerEntity,
  NewCustomerEntity,
} from '../customers/entities/customer.entity';

/** In-process stand-in for the DynamoDB table; records every call. */
export class InMemoryCustomerStore extends CustomerStore {
  readonly records = new Map<string, CustomerEntity>();
  readonly existsCalls: string[] = [];
  readonly saved: CustomerEntity[] = [];
  readonly deleted: string[] = [];
  private sequence = 0;

  async exists(documentNumber: string) {
    this.existsCalls.push(documentNumber);
    return [...this.records.values()].some(
      (record) => record.documentNumber === documentNumber,
    );
  }

  async get(customerId: string) {
    const record = this.records.get(customerId);
    return record ? { ...record } : undefined;
  }

  async getByDocumentNumber(documentNumber: string) {
    const record = [...this.records.values()].find(
      (entry) => entry.documentNumber === documentNumber,
    );
    return record ? { ...record } : undefined;
  }

  async list() {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async listByType(customerType: CustomerType) {
    return (await this.list()).filter(
      (record) => record.customerType === customerType,
    );
  }

  async save(customer: NewCustomerEntity) {
    this.sequence += 1;
    const record: CustomerEntity = {
      ...customer,
      customerId: customer.customerId ?? `cust-${this.sequence}`,
    };
    this.records.set(record.customerId, record);
    this.saved.push({ ...record });
    return { ...record };
  }

  async deleteById(customerId: string) {
    this.deleted.push(customerId);
    this.records.delete(customerId);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CustomerStore } from './customer.store';
import { CustomerValidator } from './customer.validator';
import { CustomerType } from './customer-type';
import { CustomerRequestDto } from './dto/customer-request.dto';
import { CustomerResponse } from './dto/customer-response';
import { UpgradeCustomerDto } from './dto/upgrade-customer.dto';
import { CustomerEntity } from './entities/customer.entity';
import { CustomerNotFoundException } from './customer.errors';
import {
  mergeCustomer,
  toCustomerResponse,
  toNewCustomer,
} from './customer.mapper';
import { CustomerEventPublisher } from '../events/customer-event.publisher';
import {
  createLifecycleEvent,
  LifecycleEventType,
} from '../events/lifecycle-event';

export const CUSTOMER_ENTITY_TYPE = 'Customer';

export type DeleteMode = 'soft' | 'hard';

/**
 * Customer lifecycle: absent -> active -> inactive. Every mutation validates
 * first, writes once, then hands a lifecycle event to the publisher without
 * waiting for it.
 */
@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);
  private readonly deleteMode: DeleteMode;

  constructor(
    private readonly store: CustomerStore,
    private readonly validator: CustomerValidator,
    private readonly events: CustomerEventPublisher,
    config: ConfigService,
  ) {
    this.deleteMode =
      config.get<string>('CUSTOMER_DELETE_MODE') === 'hard' ? 'hard' : 'soft';
  }

  async create(request: CustomerRequestDto): Promise<CustomerResponse> {
    this.logger.debug(
      `Creating customer with document number: ${request.documentNumber}`,
    );
    const documentType = await this.validator.validateDocument(request);

    const candidate = toNewCustomer(
      request,
      documentType.code,
      new Date().toISOString(),
    );
    this.validator.validatePremiumEligibility(candidate.customerType, candidate);

    const saved = await this.store.save(candidate);
    this.emit('CUSTOMER_CREATED', saved);
    return toCustomerResponse(saved);
  }

  async findAll(customerType?: CustomerType): Promise<CustomerResponse[]> {
    this.logger.debug(
      customerType
        ? `Finding customers of type ${customerType}`
        : 'Finding all customers',
    );
    const customers = customerType
      ? await this.store.listByType(customerType)
      : await this.store.list();
    return customers.map(toCustomerResponse);
  }

  async findById(customerId: string): Promise<CustomerResponse> {
    return toCustomerResponse(await this.load(customerId));
  }

  async findByDocumentNumber(
    documentNumber: string,
  ): Promise<CustomerResponse> {
    this.logger.debug(
      `Finding customer by document number: ${documentNumber}`,
    );
    const customer = await this.store.getByDocumentNumber(documentNumber);
    if (!customer) {
      throw new CustomerNotFoundException(documentNumber, 'documentNumber');
    }
    return toCustomerResponse(customer);
  }

  async update(
    customerId: string,
    request: CustomerRequestDto,
  ): Promise<CustomerResponse> {
    this.logger.debug(`Updating customer with id: ${customerId}`);
    const existing = await this.loadActive(customerId);
    const documentType = await this.validator.validateDocument(
      request,
      existing,
    );

    const merged = mergeCustomer(
      existing,
      request,
      documentType.code,
      new Date().toISOString(),
    );
    this.validator.validatePremiumEligibility(merged.customerType, merged);

    const saved = await this.store.save(merged);
    this.emit('CUSTOMER_UPDATED', saved);
    return toCustomerResponse(saved);
  }

  async remove(customerId: string): Promise<void> {
    this.logger.debug(
      `Deleting customer with id: ${customerId} (${this.deleteMode})`,
    );
    const existing = await this.loadActive(customerId);
    const inactive: CustomerEntity = {
      ...existing,
      active: false,
      updatedAt: new Date().toISOString(),
    };

    if (this.deleteMode === 'hard') {
      await this.store.deleteById(customerId);
      this.emit('CUSTOMER_DELETED', inactive);
      return;
    }

    const saved = await this.store.save(inactive);
    this.emit('CUSTOMER_DELETED', saved);
  }

  /** Changes the customer type only; no lifecycle event is published. */
  async upgrade(
    customerId: string,
    request: UpgradeCustomerDto,
  ): Promise<CustomerResponse> {
    this.logger.debug(
      `Upgrading customer ${customerId} to ${request.customerType}`,
    );
    const existing = await this.loadActive(customerId);
    this.validator.validatePremiumEligibility(request.customerType, existing);

    const saved = await this.store.save({
      ...existing,
      customerType: request.customerType,
      updatedAt: new Date().toISOString(),
    });
    return toCustomerResponse(saved);
  }

  private async load(customerId: string) {
    const customer = await this.store.get(customerId);
    if (!customer) {
      throw new CustomerNotFoundException(customerId);
    }
    return customer;
  }

  // Inactive records accept no further transitions.
  private async loadActive(customerId: string) {
    const customer = await this.load(customerId);
    if (!customer.active) {
      throw new CustomerNotFoundException(customerId);
    }
    return customer;
  }

  private emit(eventType: LifecycleEventType, customer: CustomerEntity) {
    const event = createLifecycleEvent(eventType, CUSTOMER_ENTITY_TYPE, {
      ...customer,
    });
    void this.events.publish(customer.customerId, event).then(
      () =>
        this.logger.log(
          `${eventType} published for customer ${customer.customerId}`,
        ),
      (error: unknown) =>
        this.logger.error(
          `Failed to publish ${eventType} for customer ${customer.customerId}`,
          error instanceof Error ? error.stack : String(error),
        ),
    );
  }
}

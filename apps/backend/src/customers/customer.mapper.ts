import { CustomerRequestDto } from './dto/customer-request.dto';
import { CustomerResponse } from './dto/customer-response';
import {
  CustomerEntity,
  NewCustomerEntity,
} from './entities/customer.entity';

export const toNewCustomer = (
  request: CustomerRequestDto,
  documentType: string,
  now: string,
): NewCustomerEntity => ({
  customerType: request.customerType,
  documentType,
  documentNumber: request.documentNumber,
  names: request.names,
  lastName: request.lastName,
  motherLastName: request.motherLastName,
  businessName: request.businessName,
  birthdate: request.birthdate,
  phoneNumber: request.phoneNumber,
  email: request.email,
  address: request.address,
  hasCreditCard: request.hasCreditCard ?? false,
  active: true,
  createdAt: now,
  updatedAt: now,
});

/**
 * Full replacement of the mutable fields. Identity, createdAt and active are
 * carried over; hasCreditCard is kept when the request leaves it out.
 */
export const mergeCustomer = (
  existing: CustomerEntity,
  request: CustomerRequestDto,
  documentType: string,
  now: string,
): CustomerEntity => ({
  customerId: existing.customerId,
  customerType: request.customerType,
  documentType,
  documentNumber: request.documentNumber,
  names: request.names,
  lastName: request.lastName,
  motherLastName: request.motherLastName,
  businessName: request.businessName,
  birthdate: request.birthdate,
  phoneNumber: request.phoneNumber,
  email: request.email,
  address: request.address,
  hasCreditCard: request.hasCreditCard ?? existing.hasCreditCard,
  active: existing.active,
  createdAt: existing.createdAt,
  updatedAt: now,
});

export const toCustomerResponse = (
  customer: CustomerEntity,
): CustomerResponse => ({
  id: customer.customerId,
  customerType: customer.customerType,
  documentType: customer.documentType,
  documentNumber: customer.documentNumber,
  names: customer.names,
  lastName: customer.lastName,
  motherLastName: customer.motherLastName,
  businessName: customer.businessName,
  birthdate: customer.birthdate,
  phoneNumber: customer.phoneNumber,
  email: customer.email,
  address: customer.address,
  hasCreditCard: customer.hasCreditCard,
  active: customer.active,
  createdAt: customer.createdAt,
  updatedAt: customer.updatedAt,
});

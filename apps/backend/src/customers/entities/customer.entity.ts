import { CustomerType } from '../customer-type';

export interface CustomerEntity {
  customerId: string;
  customerType: CustomerType;
  documentType: string;
  documentNumber: string;
  names: string;
  lastName: string;
  motherLastName: string;
  businessName?: string;
  birthdate?: string;
  phoneNumber: string;
  email?: string;
  address?: string;
  hasCreditCard: boolean;
  active: boolean;
  createdAt: string;
  updatedAt: string;
}

/** A record that has not been saved yet carries no id. */
export type NewCustomerEntity = Omit<CustomerEntity, 'customerId'> & {
  customerId?: string;
};

export const canOpenPremiumAccounts = (customer: {
  hasCreditCard?: boolean;
}) => customer.hasCreditCard === true;

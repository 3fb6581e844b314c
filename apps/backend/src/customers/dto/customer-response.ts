import { CustomerType } from '../customer-type';

export interface CustomerResponse {
  id: string;
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

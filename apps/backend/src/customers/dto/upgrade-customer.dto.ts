import { IsEnum } from 'class-validator';
import { CustomerType } from '../customer-type';

export class UpgradeCustomerDto {
  @IsEnum(CustomerType)
  customerType!: CustomerType;
}

import { Transform } from 'class-transformer';
import { IsEnum, IsOptional } from 'class-validator';
import { CustomerType } from '../customer-type';

const upper = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

export class CustomerSearchQueryDto {
  @IsOptional()
  @IsEnum(CustomerType)
  @Transform(upper)
  customerType?: CustomerType;
}

import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { CustomerType } from '../customer-type';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

// documentType/documentNumber are checked by CustomerValidator so callers get
// the document-specific messages; only presence is enforced here.
export class CustomerRequestDto {
  @IsEnum(CustomerType)
  customerType!: CustomerType;

  @IsString()
  @IsNotEmpty()
  documentType!: string;

  @IsString()
  @IsNotEmpty()
  documentNumber!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  @Transform(trim)
  names!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  @Transform(trim)
  lastName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  @Transform(trim)
  motherLastName!: string;

  @IsOptional()
  @IsString()
  @MaxLength(256)
  businessName?: string;

  @IsOptional()
  @IsDateString()
  birthdate?: string;

  @IsString()
  @IsNotEmpty()
  phoneNumber!: string;

  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsString()
  address?: string;

  // Reads the raw value so implicit conversion cannot turn "false" into true.
  @IsOptional()
  @IsBoolean()
  @Transform(({ obj }) => obj.hasCreditCard)
  hasCreditCard?: boolean;
}

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CustomersService } from './customers.service';
import { Roles } from '../auth/roles.decorator';
import { CurrentIdentity } from '../auth/current-identity.decorator';
import { IdentityContext } from '../auth/identity';
import { CustomerRequestDto } from './dto/customer-request.dto';
import { UpgradeCustomerDto } from './dto/upgrade-customer.dto';
import { CustomerSearchQueryDto } from './dto/customer-search-query.dto';

@Controller('customers')
export class CustomersController {
  private readonly logger = new Logger(CustomersController.name);

  constructor(private readonly customersService: CustomersService) {}

  @Post()
  create(
    @Body() dto: CustomerRequestDto,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('CREATE CUSTOMER', identity);
    return this.customersService.create(dto);
  }

  @Roles('ROLE_ADMIN')
  @Get()
  findAll(
    @Query() query: CustomerSearchQueryDto,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('FIND ALL CUSTOMERS', identity);
    return this.customersService.findAll(query.customerType);
  }

  @Get('document/:documentNumber')
  findByDocumentNumber(
    @Param('documentNumber') documentNumber: string,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('FIND CUSTOMER BY DOCUMENT', identity);
    return this.customersService.findByDocumentNumber(documentNumber);
  }

  @Get(':id')
  findOne(
    @Param('id') id: string,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('FIND CUSTOMER BY ID', identity);
    return this.customersService.findById(id);
  }

  @Put('upgrade/:id')
  upgrade(
    @Param('id') id: string,
    @Body() dto: UpgradeCustomerDto,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('UPGRADE CUSTOMER', identity);
    return this.customersService.upgrade(id, dto);
  }

  @Put(':id')
  update(
    @Param('id') id: string,
    @Body() dto: CustomerRequestDto,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('UPDATE CUSTOMER', identity);
    return this.customersService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @Param('id') id: string,
    @CurrentIdentity() identity: IdentityContext,
  ) {
    this.audit('DELETE CUSTOMER', identity);
    return this.customersService.remove(id);
  }

  private audit(operation: string, identity: IdentityContext) {
    const caller = identity.authenticated ? identity.userId : 'anonymous';
    this.logger.debug(
      `${operation} by ${caller} roles=[${[...identity.roles].join(', ')}]`,
    );
  }
}

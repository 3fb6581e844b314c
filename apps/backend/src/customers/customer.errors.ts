import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export class CustomerNotFoundException extends NotFoundException {
  constructor(
    readonly value: string,
    readonly field: 'id' | 'documentNumber' = 'id',
  ) {
    super(`Customer not found with ${field}: ${value}`);
  }
}

export class DuplicateDocumentException extends ConflictException {
  constructor(readonly documentNumber: string) {
    super(`Customer already exists with document number: ${documentNumber}`);
  }
}

export class InvalidDocumentTypeException extends BadRequestException {
  constructor(
    readonly documentType: string,
    validCodes: readonly string[],
  ) {
    super(
      `Invalid document type: ${documentType}. Valid types: ${validCodes.join(', ')}`,
    );
  }
}

export class InvalidDocumentLengthException extends BadRequestException {
  constructor(
    readonly documentType: string,
    readonly expected: number,
    readonly received: number,
  ) {
    super(
      `${documentType} must have exactly ${expected} characters. Received: ${received}`,
    );
  }
}

export class InvalidDocumentFormatException extends BadRequestException {
  constructor(
    readonly documentType: string,
    numericOnly: boolean,
  ) {
    super(
      numericOnly
        ? `${documentType} must contain only digits`
        : `${documentType} must contain only letters and digits`,
    );
  }
}

export class PremiumRequiresCreditCardException extends UnprocessableEntityException {
  constructor(readonly customerType: string) {
    super(`Customer type ${customerType} requires an active credit card`);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { CustomerStore } from './customer.store';
import { CustomerType, CustomerTypeCatalog } from './customer-type';
import {
  DocumentTypeDefinition,
  hasValidFormat,
  hasValidLength,
  resolveDocumentType,
} from './document-type';
import { canOpenPremiumAccounts } from './entities/customer.entity';
import {
  DuplicateDocumentException,
  InvalidDocumentFormatException,
  InvalidDocumentLengthException,
  PremiumRequiresCreditCardException,
} from './customer.errors';

export interface DocumentCandidate {
  documentType: string;
  documentNumber: string;
}

/**
 * Accept/reject decisions taken before any customer mutation. Stages run in
 * a fixed order and the first failing stage throws; nothing here writes.
 */
@Injectable()
export class CustomerValidator {
  private readonly logger = new Logger(CustomerValidator.name);

  constructor(
    private readonly store: CustomerStore,
    private readonly customerTypes: CustomerTypeCatalog,
  ) {}

  /**
   * Document type, length, format, then uniqueness. When `existing` is given
   * and the number is unchanged the store is not consulted.
   */
  async validateDocument(
    candidate: DocumentCandidate,
    existing?: { documentNumber: string },
  ): Promise<DocumentTypeDefinition> {
    const type = this.validateDocumentType(candidate.documentType);
    this.validateDocumentLength(type, candidate.documentNumber);
    this.validateDocumentFormat(type, candidate.documentNumber);
    await this.validateUniqueDocument(candidate.documentNumber, existing);
    return type;
  }

  validateDocumentType(code: string): DocumentTypeDefinition {
    return resolveDocumentType(code);
  }

  validateDocumentLength(
    type: DocumentTypeDefinition,
    documentNumber: string | undefined,
  ) {
    if (!hasValidLength(type, documentNumber)) {
      throw new InvalidDocumentLengthException(
        type.code,
        type.requiredLength,
        documentNumber?.length ?? 0,
      );
    }
  }

  validateDocumentFormat(
    type: DocumentTypeDefinition,
    documentNumber: string | undefined,
  ) {
    if (!hasValidFormat(type, documentNumber)) {
      throw new InvalidDocumentFormatException(type.code, type.numericOnly);
    }
  }

  async validateUniqueDocument(
    documentNumber: string,
    existing?: { documentNumber: string },
  ) {
    if (existing && existing.documentNumber === documentNumber) {
      return;
    }
    if (await this.store.exists(documentNumber)) {
      this.logger.warn(`Document number already exists: ${documentNumber}`);
      throw new DuplicateDocumentException(documentNumber);
    }
  }

  /**
   * Premium eligibility of `customer` under `customerType`. Upgrades pass the
   * target type while the record still holds the current one.
   */
  validatePremiumEligibility(
    customerType: CustomerType,
    customer: { hasCreditCard?: boolean },
  ) {
    this.logger.debug(
      `Validating premium eligibility for type: ${customerType}`,
    );
    if (
      this.customerTypes.requiresCreditCard(customerType) &&
      !canOpenPremiumAccounts(customer)
    ) {
      this.logger.warn(
        `Customer type ${customerType} requires an active credit card`,
      );
      throw new PremiumRequiresCreditCardException(customerType);
    }
  }
}

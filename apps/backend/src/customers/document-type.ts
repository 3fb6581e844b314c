import { InvalidDocumentTypeException } from './customer.errors';

export interface DocumentTypeDefinition {
  code: string;
  requiredLength: number;
  numericOnly: boolean;
}

export const DOCUMENT_TYPES = [
  { code: 'DNI', requiredLength: 8, numericOnly: true },
  { code: 'RUC', requiredLength: 11, numericOnly: true },
  { code: 'FOREIGNERS_CARD', requiredLength: 12, numericOnly: false },
  { code: 'PASSPORT', requiredLength: 15, numericOnly: false },
] as const satisfies readonly DocumentTypeDefinition[];

export type DocumentTypeCode = (typeof DOCUMENT_TYPES)[number]['code'];

export const DOCUMENT_TYPE_CODES: readonly DocumentTypeCode[] =
  DOCUMENT_TYPES.map((type) => type.code);

const NUMERIC = /^[0-9]+$/;
const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

export const findDocumentType = (
  code: string | null | undefined,
): DocumentTypeDefinition | undefined => {
  if (typeof code !== 'string') {
    return undefined;
  }
  const normalized = code.toUpperCase();
  return DOCUMENT_TYPES.find((type) => type.code === normalized);
};

export const isValidDocumentType = (code: string | null | undefined) =>
  findDocumentType(code) !== undefined;

export const resolveDocumentType = (
  code: string | null | undefined,
): DocumentTypeDefinition => {
  const type = findDocumentType(code);
  if (!type) {
    throw new InvalidDocumentTypeException(code ?? '', DOCUMENT_TYPE_CODES);
  }
  return type;
};

/** Exact character count; surrounding whitespace is not trimmed. */
export const hasValidLength = (
  type: DocumentTypeDefinition,
  documentNumber: string | null | undefined,
) =>
  typeof documentNumber === 'string' &&
  documentNumber.length === type.requiredLength;

export const hasValidFormat = (
  type: DocumentTypeDefinition,
  documentNumber: string | null | undefined,
) => {
  if (typeof documentNumber !== 'string' || documentNumber.trim() === '') {
    return false;
  }
  return (type.numericOnly ? NUMERIC : ALPHANUMERIC).test(documentNumber);
};

export const isValidDocument = (
  type: DocumentTypeDefinition,
  documentNumber: string | null | undefined,
) =>
  hasValidLength(type, documentNumber) && hasValidFormat(type, documentNumber);

export enum CustomerType {
  PERSONAL = 'PERSONAL',
  BUSINESS = 'BUSINESS',
  VIP = 'VIP',
  PYME = 'PYME',
}

export const CUSTOMER_TYPES: readonly CustomerType[] =
  Object.values(CustomerType);

export const DEFAULT_PREMIUM_CUSTOMER_TYPES: readonly CustomerType[] = [
  CustomerType.VIP,
  CustomerType.PYME,
];

export const isCustomerType = (value: unknown): value is CustomerType =>
  typeof value === 'string' &&
  CUSTOMER_TYPES.some((type) => type === value);

/**
 * Credit-card requirement per customer type. Built once at startup; the
 * per-variant flags never change afterwards.
 */
export class CustomerTypeCatalog {
  private readonly requirements: ReadonlyMap<CustomerType, boolean>;

  constructor(
    premiumTypes: readonly CustomerType[] = DEFAULT_PREMIUM_CUSTOMER_TYPES,
  ) {
    this.requirements = new Map(
      CUSTOMER_TYPES.map((type) => [type, premiumTypes.includes(type)]),
    );
  }

  static fromCodes(codes: readonly string[]): CustomerTypeCatalog {
    const premium: CustomerType[] = [];
    for (const code of codes) {
      const normalized = code.trim().toUpperCase();
      if (normalized === '') {
        continue;
      }
      if (!isCustomerType(normalized)) {
        throw new Error(
          `Unknown customer type in PREMIUM_CUSTOMER_TYPES: ${code}`,
        );
      }
      premium.push(normalized);
    }
    return new CustomerTypeCatalog(premium);
  }

  requiresCreditCard(type: CustomerType): boolean {
    return this.requirements.get(type) ?? false;
  }
}

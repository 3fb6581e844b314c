import { CustomerType, CustomerTypeCatalog } from './customer-type';

describe('CustomerTypeCatalog', () => {
  it('requires a credit card for VIP and PYME by default', () => {
    const catalog = new CustomerTypeCatalog();
    expect(catalog.requiresCreditCard(CustomerType.VIP)).toBe(true);
    expect(catalog.requiresCreditCard(CustomerType.PYME)).toBe(true);
    expect(catalog.requiresCreditCard(CustomerType.PERSONAL)).toBe(false);
    expect(catalog.requiresCreditCard(CustomerType.BUSINESS)).toBe(false);
  });

  it('builds from configured codes', () => {
    const catalog = CustomerTypeCatalog.fromCodes([' business ', 'vip', '']);
    expect(catalog.requiresCreditCard(CustomerType.BUSINESS)).toBe(true);
    expect(catalog.requiresCreditCard(CustomerType.VIP)).toBe(true);
    expect(catalog.requiresCreditCard(CustomerType.PYME)).toBe(false);
    expect(catalog.requiresCreditCard(CustomerType.PERSONAL)).toBe(false);
  });

  it('allows an empty premium set', () => {
    const catalog = CustomerTypeCatalog.fromCodes([]);
    expect(catalog.requiresCreditCard(CustomerType.VIP)).toBe(false);
    expect(catalog.requiresCreditCard(CustomerType.PYME)).toBe(false);
  });

  it('rejects unknown codes', () => {
    expect(() => CustomerTypeCatalog.fromCodes(['GOLD'])).toThrow(
      'Unknown customer type in PREMIUM_CUSTOMER_TYPES: GOLD',
    );
  });
});

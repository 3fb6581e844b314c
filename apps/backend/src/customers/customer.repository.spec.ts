import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { DYNAMO_DOCUMENT_CLIENT } from '../config/dynamo.config';
import {
  CUSTOMER_TYPE_INDEX,
  CustomerRepository,
  DOCUMENT_NUMBER_INDEX,
} from './customer.repository';
import { CustomerType } from './customer-type';
import { NewCustomerEntity } from './entities/customer.entity';

const customer: NewCustomerEntity = {
  customerType: CustomerType.PERSONAL,
  documentType: 'DNI',
  documentNumber: '12345678',
  names: 'Lucia',
  lastName: 'Quispe',
  motherLastName: 'Mamani',
  phoneNumber: '987654321',
  hasCreditCard: false,
  active: true,
  createdAt: '2024-03-01T10:00:00.000Z',
  updatedAt: '2024-03-01T10:00:00.000Z',
};

describe('CustomerRepository', () => {
  const send = jest.fn();
  let repository: CustomerRepository;

  beforeEach(async () => {
    send.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        CustomerRepository,
        { provide: DYNAMO_DOCUMENT_CLIENT, useValue: { send } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ CUSTOMERS_TABLE_NAME: 'customers-test' }),
        },
      ],
    }).compile();
    repository = moduleRef.get(CustomerRepository);
  });

  it('counts matches on the document number index', async () => {
    send.mockResolvedValueOnce({ Count: 1 }).mockResolvedValueOnce({ Count: 0 });

    await expect(repository.exists('12345678')).resolves.toBe(true);
    await expect(repository.exists('87654321')).resolves.toBe(false);

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(QueryCommand);
    expect(command.input).toEqual({
      TableName: 'customers-test',
      IndexName: DOCUMENT_NUMBER_INDEX,
      KeyConditionExpression: 'documentNumber = :doc',
      ExpressionAttributeValues: { ':doc': '12345678' },
      Select: 'COUNT',
      Limit: 1,
    });
  });

  it('assigns an id and guards the first write', async () => {
    send.mockResolvedValueOnce({});

    const saved = await repository.save(customer);

    expect(saved.customerId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutCommand);
    expect(command.input).toEqual({
      TableName: 'customers-test',
      Item: saved,
      ConditionExpression: 'attribute_not_exists(customerId)',
    });
  });

  it('overwrites an existing record by id', async () => {
    send.mockResolvedValueOnce({});

    const saved = await repository.save({ ...customer, customerId: 'c-1' });

    expect(saved.customerId).toBe('c-1');
    expect(send.mock.calls[0][0].input).toEqual({
      TableName: 'customers-test',
      Item: { ...customer, customerId: 'c-1' },
    });
  });

  it('reads a record by id', async () => {
    send.mockResolvedValueOnce({ Item: { ...customer, customerId: 'c-1' } });

    const found = await repository.get('c-1');

    expect(found?.customerId).toBe('c-1');
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetCommand);
    expect(command.input.Key).toEqual({ customerId: 'c-1' });
  });

  it('returns the first match by document number', async () => {
    send.mockResolvedValueOnce({ Items: [{ ...customer, customerId: 'c-1' }] });
    send.mockResolvedValueOnce({ Items: [] });

    expect((await repository.getByDocumentNumber('12345678'))?.customerId).toBe(
      'c-1',
    );
    expect(await repository.getByDocumentNumber('00000000')).toBeUndefined();
  });

  it('follows scan pages until the last key', async () => {
    send
      .mockResolvedValueOnce({
        Items: [{ ...customer, customerId: 'c-1' }],
        LastEvaluatedKey: { customerId: 'c-1' },
      })
      .mockResolvedValueOnce({ Items: [{ ...customer, customerId: 'c-2' }] });

    const all = await repository.list();

    expect(all.map((entry) => entry.customerId)).toEqual(['c-1', 'c-2']);
    expect(send.mock.calls[0][0]).toBeInstanceOf(ScanCommand);
    expect(send.mock.calls[1][0].input.ExclusiveStartKey).toEqual({
      customerId: 'c-1',
    });
  });

  it('queries the customer type index', async () => {
    send.mockResolvedValueOnce({ Items: [] });

    await repository.listByType(CustomerType.VIP);

    expect(send.mock.calls[0][0].input).toMatchObject({
      IndexName: CUSTOMER_TYPE_INDEX,
      ExpressionAttributeValues: { ':type': 'VIP' },
    });
  });

  it('deletes by id', async () => {
    send.mockResolvedValueOnce({});

    await repository.deleteById('c-1');

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DeleteCommand);
    expect(command.input).toEqual({
      TableName: 'customers-test',
      Key: { customerId: 'c-1' },
    });
  });
});

import { Inject, Injectable } from '@nestjs/common';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { DYNAMO_DOCUMENT_CLIENT } from '../config/dynamo.config';
import { CustomerStore } from './customer.store';
import { CustomerType } from './customer-type';
import {
  CustomerEntity,
  NewCustomerEntity,
} from './entities/customer.entity';

export const DOCUMENT_NUMBER_INDEX = 'documentNumber-index';
export const CUSTOMER_TYPE_INDEX = 'customerType-index';

@Injectable()
export class CustomerRepository extends CustomerStore {
  private readonly tableName: string;

  constructor(
    @Inject(DYNAMO_DOCUMENT_CLIENT)
    private readonly dynamo: DynamoDBDocumentClient,
    private readonly config: ConfigService,
  ) {
    super();
    this.tableName =
      this.config.get<string>('CUSTOMERS_TABLE_NAME') ?? 'bank-customers';
  }

  async exists(documentNumber: string) {
    const result = await this.dynamo.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: DOCUMENT_NUMBER_INDEX,
        KeyConditionExpression: 'documentNumber = :doc',
        ExpressionAttributeValues: {
          ':doc': documentNumber,
        },
        Select: 'COUNT',
        Limit: 1,
      }),
    );
    return (result.Count ?? 0) > 0;
  }

  async get(customerId: string) {
    const result = await this.dynamo.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { customerId },
      }),
    );
    return result.Item as CustomerEntity | undefined;
  }

  async getByDocumentNumber(documentNumber: string) {
    const result = await this.dynamo.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: DOCUMENT_NUMBER_INDEX,
        KeyConditionExpression: 'documentNumber = :doc',
        ExpressionAttributeValues: {
          ':doc': documentNumber,
        },
        Limit: 1,
      }),
    );
    return result.Items?.[0] as CustomerEntity | undefined;
  }

  async list() {
    const items: CustomerEntity[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const result = await this.dynamo.send(
        new ScanCommand({
          TableName: this.tableName,
          ExclusiveStartKey: startKey,
        }),
      );
      items.push(...((result.Items ?? []) as CustomerEntity[]));
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  async listByType(customerType: CustomerType) {
    const items: CustomerEntity[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const result = await this.dynamo.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: CUSTOMER_TYPE_INDEX,
          KeyConditionExpression: 'customerType = :type',
          ExpressionAttributeValues: {
            ':type': customerType,
          },
          ExclusiveStartKey: startKey,
        }),
      );
      items.push(...((result.Items ?? []) as CustomerEntity[]));
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  async save(customer: NewCustomerEntity) {
    if (customer.customerId) {
      const item: CustomerEntity = {
        ...customer,
        customerId: customer.customerId,
      };
      await this.dynamo.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
        }),
      );
      return item;
    }

    const item: CustomerEntity = { ...customer, customerId: randomUUID() };
    await this.dynamo.send(
      new PutCommand({
        TableName: this.tableName,
        Item: item,
        ConditionExpression: 'attribute_not_exists(customerId)',
      }),
    );
    return item;
  }

  async deleteById(customerId: string) {
    await this.dynamo.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { customerId },
      }),
    );
  }
}

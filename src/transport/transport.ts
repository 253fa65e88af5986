/**
 * Transport
 *
 * The mapper talks to the store through this interface only. `SdkTransport`
 * sends each request through the AWS SDK client; tests substitute
 * `MockTransport`.
 */

import {
  BatchGetItemCommand,
  BatchWriteItemCommand,
  CreateTableCommand,
  DeleteItemCommand,
  DescribeTableCommand,
  GetItemCommand,
  PutItemCommand,
  QueryCommand,
  ScanCommand,
  UpdateItemCommand,
} from '@aws-sdk/client-dynamodb';
import type {
  BatchGetItemCommandInput,
  BatchGetItemCommandOutput,
  BatchWriteItemCommandInput,
  BatchWriteItemCommandOutput,
  CreateTableCommandInput,
  CreateTableCommandOutput,
  DeleteItemCommandInput,
  DeleteItemCommandOutput,
  DescribeTableCommandInput,
  DescribeTableCommandOutput,
  DynamoDBClient,
  GetItemCommandInput,
  GetItemCommandOutput,
  PutItemCommandInput,
  PutItemCommandOutput,
  QueryCommandInput,
  QueryCommandOutput,
  ScanCommandInput,
  ScanCommandOutput,
  UpdateItemCommandInput,
  UpdateItemCommandOutput,
} from '@aws-sdk/client-dynamodb';

/**
 * Request and response types of every store operation the mapper uses
 */
export interface TransportOperations {
  putItem: [PutItemCommandInput, PutItemCommandOutput];
  getItem: [GetItemCommandInput, GetItemCommandOutput];
  updateItem: [UpdateItemCommandInput, UpdateItemCommandOutput];
  deleteItem: [DeleteItemCommandInput, DeleteItemCommandOutput];
  query: [QueryCommandInput, QueryCommandOutput];
  scan: [ScanCommandInput, ScanCommandOutput];
  batchGetItem: [BatchGetItemCommandInput, BatchGetItemCommandOutput];
  batchWriteItem: [BatchWriteItemCommandInput, BatchWriteItemCommandOutput];
  createTable: [CreateTableCommandInput, CreateTableCommandOutput];
  describeTable: [DescribeTableCommandInput, DescribeTableCommandOutput];
}

export type TransportOperation = keyof TransportOperations;
export type TransportInput<K extends TransportOperation> = TransportOperations[K][0];
export type TransportOutput<K extends TransportOperation> = TransportOperations[K][1];

export type DynamoDBTransport = {
  [K in TransportOperation]: (input: TransportInput<K>) => Promise<TransportOutput<K>>;
} & {
  /** Releases underlying resources */
  close(): void;
};

/**
 * Transport over the AWS SDK client
 */
export class SdkTransport implements DynamoDBTransport {
  constructor(private readonly client: DynamoDBClient) {}

  putItem(input: PutItemCommandInput): Promise<PutItemCommandOutput> {
    return this.client.send(new PutItemCommand(input));
  }

  getItem(input: GetItemCommandInput): Promise<GetItemCommandOutput> {
    return this.client.send(new GetItemCommand(input));
  }

  updateItem(input: UpdateItemCommandInput): Promise<UpdateItemCommandOutput> {
    return this.client.send(new UpdateItemCommand(input));
  }

  deleteItem(input: DeleteItemCommandInput): Promise<DeleteItemCommandOutput> {
    return this.client.send(new DeleteItemCommand(input));
  }

  query(input: QueryCommandInput): Promise<QueryCommandOutput> {
    return this.client.send(new QueryCommand(input));
  }

  scan(input: ScanCommandInput): Promise<ScanCommandOutput> {
    return this.client.send(new ScanCommand(input));
  }

  batchGetItem(input: BatchGetItemCommandInput): Promise<BatchGetItemCommandOutput> {
    return this.client.send(new BatchGetItemCommand(input));
  }

  batchWriteItem(input: BatchWriteItemCommandInput): Promise<BatchWriteItemCommandOutput> {
    return this.client.send(new BatchWriteItemCommand(input));
  }

  createTable(input: CreateTableCommandInput): Promise<CreateTableCommandOutput> {
    return this.client.send(new CreateTableCommand(input));
  }

  describeTable(input: DescribeTableCommandInput): Promise<DescribeTableCommandOutput> {
    return this.client.send(new DescribeTableCommand(input));
  }

  close(): void {
    this.client.destroy();
  }
}

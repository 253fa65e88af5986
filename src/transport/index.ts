export { SdkTransport } from './transport.js';
export type {
  DynamoDBTransport,
  TransportOperations,
  TransportOperation,
  TransportInput,
  TransportOutput,
} from './transport.js';

/**
 * Create the dreams table in DynamoDB Local (DREAM_STORE=dynamodb).
 * Does nothing when the table is already there.
 *
 * Usage: npm run db:setup
 */

import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';

const tableName = process.env.DREAMS_TABLE ?? 'SprintGarden';
const endpoint = process.env.DYNAMODB_ENDPOINT ?? 'http://127.0.0.1:8000';

// DynamoDB Local accepts any credentials
const dynamo = new DynamoDBClient({
  endpoint,
  region: process.env.AWS_REGION ?? 'us-east-1',
  credentials: { accessKeyId: 'local', secretAccessKey: 'local' },
});

const keys = [
  { name: 'PK', keyType: 'HASH' },
  { name: 'SK', keyType: 'RANGE' },
] as const;

async function tableExists(): Promise<boolean> {
  try {
    await dynamo.send(new DescribeTableCommand({ TableName: tableName }));
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundException) {
      return false;
    }
    throw error;
  }
}

async function setup(): Promise<void> {
  if (await tableExists()) {
    console.log(`${tableName} already exists at ${endpoint}`);
    return;
  }

  await dynamo.send(
    new CreateTableCommand({
      TableName: tableName,
      BillingMode: 'PAY_PER_REQUEST',
      KeySchema: keys.map((key) => ({ AttributeName: key.name, KeyType: key.keyType })),
      AttributeDefinitions: keys.map((key) => ({ AttributeName: key.name, AttributeType: 'S' as const })),
    })
  );
  console.log(`Created ${tableName} at ${endpoint}`);
}

setup().catch((error: unknown) => {
  console.error('Local table setup failed:', error);
  process.exit(1);
});

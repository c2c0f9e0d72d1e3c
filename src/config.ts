import path from 'path';
import { ConfigurationError } from './errors';

export type TagMatchMode = 'contains' | 'exact';

export interface DeploymentConfig {
  region: string;
  environment: string;
  partition: string;
  accountId?: string;
  executionRoleArn?: string;
  executionRoleParameter: string;
  evaluationQueueName: string;
  namePrefix: string;
  image: string;
  imageVersion: string;
  variantName: string;
  memoryMb: number;
  maxConcurrency: number;
  testDataTagMatch: TagMatchMode;
  testDataTagKey: string;
  imageUriTable: string;
  port: number;
}

type Env = Record<string, string | undefined>;

/** Memory sizes SageMaker accepts for serverless variants, in MB. */
export const SERVERLESS_MEMORY_SIZES = [1024, 2048, 3072, 4096, 5120, 6144];
export const SERVERLESS_MAX_CONCURRENCY = 200;

export const DEFAULT_IMAGE_URI_TABLE = path.resolve(__dirname, '..', 'data', 'image-uris.json');

function integer(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, { variable: name });
  }
  return value;
}

function memorySize(env: Env): number {
  const memoryMb = integer(env, 'SERVERLESS_MEMORY_MB', 4096);
  if (!SERVERLESS_MEMORY_SIZES.includes(memoryMb)) {
    throw new ConfigurationError(
      `SERVERLESS_MEMORY_MB must be one of ${SERVERLESS_MEMORY_SIZES.join(', ')}, got ${memoryMb}`,
      { variable: 'SERVERLESS_MEMORY_MB' }
    );
  }
  return memoryMb;
}

function maxConcurrency(env: Env): number {
  const value = integer(env, 'SERVERLESS_MAX_CONCURRENCY', 1);
  if (value > SERVERLESS_MAX_CONCURRENCY) {
    throw new ConfigurationError(
      `SERVERLESS_MAX_CONCURRENCY must be at most ${SERVERLESS_MAX_CONCURRENCY}, got ${value}`,
      { variable: 'SERVERLESS_MAX_CONCURRENCY' }
    );
  }
  return value;
}

function tagMatchMode(env: Env): TagMatchMode {
  const raw = env.TEST_DATA_TAG_MATCH || 'contains';
  if (raw !== 'contains' && raw !== 'exact') {
    throw new ConfigurationError(`TEST_DATA_TAG_MATCH must be "contains" or "exact", got "${raw}"`, {
      variable: 'TEST_DATA_TAG_MATCH'
    });
  }
  return raw;
}

/**
 * Reads the deployment settings from the environment. Called once per invocation.
 */
export function loadConfig(env: Env = process.env): DeploymentConfig {
  const environment = env.SERVERLESS_ENVIRONMENT;
  if (!environment) {
    throw new ConfigurationError('Missing required environment variables: SERVERLESS_ENVIRONMENT', {
      variable: 'SERVERLESS_ENVIRONMENT'
    });
  }

  const region = env.AWS_REGION || 'eu-west-2';
  const resourcePrefix = `mlops-${region}-${environment}`;

  return {
    region,
    environment,
    partition: env.AWS_PARTITION || 'aws',
    accountId: env.AWS_ACCOUNT_ID || undefined,
    executionRoleArn: env.SAGEMAKER_ROLE_ARN || undefined,
    executionRoleParameter: env.SAGEMAKER_ROLE_ARN_PARAMETER || `${resourcePrefix}-sagemaker-role-arn`,
    evaluationQueueName: env.EVALUATION_QUEUE_NAME || `${resourcePrefix}-model-evaluation`,
    namePrefix: env.MODEL_NAME_PREFIX || 'xgboost',
    image: env.MODEL_IMAGE || 'xgboost',
    imageVersion: env.MODEL_IMAGE_VERSION || 'latest',
    variantName: env.VARIANT_NAME || 'mlops',
    memoryMb: memorySize(env),
    maxConcurrency: maxConcurrency(env),
    testDataTagMatch: tagMatchMode(env),
    testDataTagKey: env.TEST_DATA_TAG_KEY || 'Testing',
    imageUriTable: env.IMAGE_URI_TABLE || DEFAULT_IMAGE_URI_TABLE,
    port: integer(env, 'PORT', 8080)
  };
}

/**
 * Account id from `arn:aws:lambda:<region>:<account>:function:<name>`.
 */
export function accountIdFromArn(arn: string): string | undefined {
  const parts = arn.split(':');
  return parts.length >= 5 && /^\d{12}$/.test(parts[4]) ? parts[4] : undefined;
}

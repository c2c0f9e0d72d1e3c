import { Context } from 'aws-lambda';
import { accountIdFromArn, loadConfig } from './config';
import { AwsClients, createAwsClients } from './services/clients';
import { buildDeploymentService } from './services/ModelDeploymentService';
import { DeploymentResult } from './types/events';
import { decodeStorageEvent } from './utils/eventDecoder';

export interface HandlerDependencies {
  env?: Record<string, string | undefined>;
  clients?: (region: string) => AwsClients;
}

/**
 * Lambda entry for S3 `ObjectCreated` notifications on `model.tar.gz` artifacts.
 * Configuration and clients are built per invocation.
 */
export function createHandler(dependencies: HandlerDependencies = {}) {
  return async (event: unknown, context?: Pick<Context, 'invokedFunctionArn'>): Promise<DeploymentResult | null> => {
    const record = decodeStorageEvent(event);
    const config = loadConfig(dependencies.env ?? process.env);
    const clients = (dependencies.clients ?? createAwsClients)(config.region);

    const service = buildDeploymentService(config, clients, {
      accountId: context ? accountIdFromArn(context.invokedFunctionArn) : undefined
    });

    return service.deploy(record);
  };
}

export const handler = createHandler();

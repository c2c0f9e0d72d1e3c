import { DeploymentConfig } from '../config';
import { ConfigurationError, DeploymentError, errorMessage } from '../errors';
import { DeploymentResult, StorageEventRecord } from '../types/events';
import logger from '../utils/logger';
import { Clock, systemClock } from '../utils/naming';
import { locateTrainingJob, toS3Uri } from '../utils/trainingJob';
import { AwsClients } from './clients';
import { EvaluationNotifier } from './EvaluationNotifier';
import { ImageUriService } from './ImageUriService';
import { ParameterStoreService } from './ParameterStoreService';
import { SageMakerService } from './SageMakerService';
import { TrainingJobService, tagMatcherFor } from './TrainingJobService';

export type DeploymentSettings = Pick<
  DeploymentConfig,
  | 'region'
  | 'executionRoleArn'
  | 'executionRoleParameter'
  | 'evaluationQueueName'
  | 'namePrefix'
  | 'image'
  | 'imageVersion'
  | 'variantName'
  | 'memoryMb'
  | 'maxConcurrency'
>;

export interface DeploymentCollaborators {
  sageMaker: SageMakerService;
  trainingJobs: TrainingJobService;
  notifier: EvaluationNotifier;
  parameters: ParameterStoreService;
}

/**
 * Turns a new training artifact into a serverless endpoint and hands it to model evaluation.
 *
 * Steps run strictly one after another and stop at the first failure. Resources created by
 * earlier steps are left in place (no rollback); their names are logged with the error.
 */
export class ModelDeploymentService {
  constructor(
    private readonly collaborators: DeploymentCollaborators,
    private readonly settings: DeploymentSettings
  ) {}

  /**
   * Returns null for records that are not object creations.
   */
  async deploy(record: StorageEventRecord): Promise<DeploymentResult | null> {
    const { sageMaker, trainingJobs, notifier } = this.collaborators;
    const { bucketName, objectKey, eventName } = record;

    if (!eventName.includes('ObjectCreated')) {
      logger.info(`Ignoring ${eventName} event for ${objectKey}`, { bucketName });
      return null;
    }

    logger.info(`Received event: ${eventName} on bucket: ${bucketName} for object: ${objectKey}`);
    if (record.awsRegion && record.awsRegion !== this.settings.region) {
      logger.warn(`Bucket ${bucketName} is in ${record.awsRegion}, deploying to ${this.settings.region}`);
    }

    const created: Record<string, string> = {};
    try {
      const trainingJobId = locateTrainingJob(objectKey);
      created.trainingJobId = trainingJobId;

      const executionRoleArn = await this.resolveExecutionRole();

      const model = await sageMaker.createModel({
        namePrefix: this.settings.namePrefix,
        image: this.settings.image,
        imageVersion: this.settings.imageVersion,
        modelDataUrl: toS3Uri(bucketName, objectKey),
        executionRoleArn
      });
      created.modelName = model.name;
      logger.info(`Created Model Arn: ${model.arn}`);

      const endpointConfig = await sageMaker.createEndpointConfig({
        namePrefix: this.settings.namePrefix,
        modelName: model.name,
        variantName: this.settings.variantName,
        memoryMb: this.settings.memoryMb,
        maxConcurrency: this.settings.maxConcurrency
      });
      created.endpointConfigName = endpointConfig.name;
      logger.info(`Created endpoint config Arn: ${endpointConfig.arn}`);

      const endpoint = await sageMaker.createEndpoint({
        namePrefix: this.settings.namePrefix,
        endpointConfigName: endpointConfig.name
      });
      created.endpointName = endpoint.name;
      logger.info(`Created serverless endpoint Arn: ${endpoint.arn}`);

      const testData = await trainingJobs.getTestDataLocation(trainingJobId);

      await notifier.notify(endpoint.name, testData, this.settings.evaluationQueueName);
      logger.info('Message sent to model-evaluation for prediction(s)', { endpointName: endpoint.name });

      return { trainingJobId, model, endpointConfig, endpoint, testData };
    } catch (error) {
      logger.error(`Model deployment failed: ${errorMessage(error)}`, {
        bucketName,
        objectKey,
        ...created,
        ...(error instanceof DeploymentError ? error.context : {})
      });
      throw error;
    }
  }

  private async resolveExecutionRole(): Promise<string> {
    if (this.settings.executionRoleArn) {
      return this.settings.executionRoleArn;
    }
    return this.collaborators.parameters.getValue(this.settings.executionRoleParameter);
  }
}

export interface BuildOptions {
  /** Falls back to `config.accountId`. */
  accountId?: string;
  clock?: Clock;
}

export function buildDeploymentService(
  config: DeploymentConfig,
  clients: AwsClients,
  options: BuildOptions = {}
): ModelDeploymentService {
  const accountId = config.accountId ?? options.accountId;
  if (!accountId) {
    throw new ConfigurationError('AWS account id is unknown, set AWS_ACCOUNT_ID', { variable: 'AWS_ACCOUNT_ID' });
  }

  const images = new ImageUriService(config.imageUriTable);

  return new ModelDeploymentService(
    {
      sageMaker: new SageMakerService(clients.sageMaker, images, config.region, options.clock ?? systemClock),
      trainingJobs: new TrainingJobService(
        clients.sageMaker,
        { partition: config.partition, region: config.region, accountId },
        tagMatcherFor(config.testDataTagMatch, config.testDataTagKey)
      ),
      notifier: new EvaluationNotifier(clients.sqs),
      parameters: new ParameterStoreService(clients.ssm)
    },
    config
  );
}

import { Tag } from '@aws-sdk/client-sagemaker';
import { SERVERLESS_MAX_CONCURRENCY, SERVERLESS_MEMORY_SIZES } from '../config';
import { ProvisioningError, ProvisioningStep, errorMessage } from '../errors';
import {
  CapacityProfile,
  EndpointConfigDescriptor,
  EndpointDescriptor,
  ModelDescriptor
} from '../types/events';
import logger from '../utils/logger';
import { Clock, ResourceKind, resourceName, systemClock } from '../utils/naming';
import { SageMakerApi } from './clients';
import { ImageUriService } from './ImageUriService';

export interface CreateModelOptions {
  namePrefix: string;
  /** Framework name for the image lookup, e.g. `xgboost`. */
  image: string;
  /** `s3://` location of `model.tar.gz`. */
  modelDataUrl: string;
  executionRoleArn: string;
  imageVersion?: string;
}

export interface CreateEndpointConfigOptions extends Partial<CapacityProfile> {
  namePrefix: string;
  modelName: string;
  variantName: string;
}

export interface CreateEndpointOptions {
  namePrefix: string;
  endpointConfigName: string;
}

const CONTAINER_ENVIRONMENT = { SAGEMAKER_CONTAINER_LOG_LEVEL: '20' };

export class SageMakerService {
  private readonly clock: Clock;

  constructor(
    private readonly client: SageMakerApi,
    private readonly images: ImageUriService,
    private readonly region: string,
    clock: Clock = systemClock
  ) {
    this.clock = clock;
  }

  /**
   * Registers the model artifact with the framework's inference image.
   */
  async createModel(options: CreateModelOptions): Promise<ModelDescriptor> {
    const modelName = this.nameFor(options.namePrefix, 'model');
    logger.info(`Model name: ${modelName}`);

    const image = this.images.retrieve(options.image, this.region, options.imageVersion ?? 'latest');

    const response = await this.call('create-model', modelName, () => this.client.createModel({
      ModelName: modelName,
      Containers: [
        {
          Image: image,
          Mode: 'SingleModel',
          ModelDataUrl: options.modelDataUrl,
          Environment: CONTAINER_ENVIRONMENT
        }
      ],
      ExecutionRoleArn: options.executionRoleArn,
      Tags: this.tags()
    }));

    return { name: modelName, arn: this.requireArn('create-model', modelName, response.ModelArn) };
  }

  /**
   * Single serverless production variant. Data capture is not available for serverless
   * variants, so no DataCaptureConfig is sent.
   */
  async createEndpointConfig(options: CreateEndpointConfigOptions): Promise<EndpointConfigDescriptor> {
    const memoryMb = options.memoryMb ?? 4096;
    const maxConcurrency = options.maxConcurrency ?? 1;
    const configName = this.nameFor(options.namePrefix, 'endpoint-config');

    if (!SERVERLESS_MEMORY_SIZES.includes(memoryMb)) {
      throw new ProvisioningError('create-endpoint-config', `Unsupported serverless memory size ${memoryMb} MB`, {
        endpointConfigName: configName,
        memoryMb
      });
    }
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1 || maxConcurrency > SERVERLESS_MAX_CONCURRENCY) {
      throw new ProvisioningError('create-endpoint-config', `Max concurrency must be between 1 and ${SERVERLESS_MAX_CONCURRENCY}`, {
        endpointConfigName: configName,
        maxConcurrency
      });
    }

    logger.info(`Endpoint config name: ${configName}`, { modelName: options.modelName, memoryMb, maxConcurrency });

    const response = await this.call('create-endpoint-config', configName, () => this.client.createEndpointConfig({
      EndpointConfigName: configName,
      ProductionVariants: [
        {
          VariantName: options.variantName,
          ModelName: options.modelName,
          ServerlessConfig: {
            MemorySizeInMB: memoryMb,
            MaxConcurrency: maxConcurrency
          }
        }
      ],
      Tags: this.tags()
    }));

    return {
      name: configName,
      arn: this.requireArn('create-endpoint-config', configName, response.EndpointConfigArn)
    };
  }

  /**
   * Returns once SageMaker accepts the request; the endpoint is still `Creating` then.
   */
  async createEndpoint(options: CreateEndpointOptions): Promise<EndpointDescriptor> {
    const endpointName = this.nameFor(options.namePrefix, 'endpoint');
    logger.info(`Endpoint name: ${endpointName}`, { endpointConfigName: options.endpointConfigName });

    const response = await this.call('create-endpoint', endpointName, () => this.client.createEndpoint({
      EndpointName: endpointName,
      EndpointConfigName: options.endpointConfigName,
      Tags: this.tags()
    }));

    return { name: endpointName, arn: this.requireArn('create-endpoint', endpointName, response.EndpointArn) };
  }

  private nameFor(prefix: string, kind: ResourceKind): string {
    return resourceName(prefix, kind, this.clock());
  }

  private tags(): Tag[] {
    return [
      { Key: 'Project', Value: 'MLOps' },
      { Key: 'Region', Value: this.region }
    ];
  }

  private async call<T>(step: ProvisioningStep, resourceName: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new ProvisioningError(step, `SageMaker ${step} failed for ${resourceName}: ${errorMessage(error)}`, {
        resourceName
      }, error);
    }
  }

  private requireArn(step: ProvisioningStep, resourceName: string, arn: string | undefined): string {
    if (!arn) {
      throw new ProvisioningError(step, `SageMaker ${step} returned no ARN for ${resourceName}`, { resourceName });
    }
    return arn;
  }
}

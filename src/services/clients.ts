import {
  CreateEndpointCommandInput,
  CreateEndpointCommandOutput,
  CreateEndpointConfigCommandInput,
  CreateEndpointConfigCommandOutput,
  CreateModelCommandInput,
  CreateModelCommandOutput,
  ListTagsCommandInput,
  ListTagsCommandOutput,
  SageMaker
} from '@aws-sdk/client-sagemaker';
import {
  GetQueueUrlCommandInput,
  GetQueueUrlCommandOutput,
  SendMessageCommandInput,
  SendMessageCommandOutput,
  SQS
} from '@aws-sdk/client-sqs';
import { GetParameterCommandInput, GetParameterCommandOutput, SSM } from '@aws-sdk/client-ssm';

// The slices of the AWS SDK clients this worker calls. The SDK's aggregated clients
// satisfy them directly; tests hand in fakes.

export interface SageMakerApi {
  createModel(input: CreateModelCommandInput): Promise<CreateModelCommandOutput>;
  createEndpointConfig(input: CreateEndpointConfigCommandInput): Promise<CreateEndpointConfigCommandOutput>;
  createEndpoint(input: CreateEndpointCommandInput): Promise<CreateEndpointCommandOutput>;
  listTags(input: ListTagsCommandInput): Promise<ListTagsCommandOutput>;
}

export interface SqsApi {
  getQueueUrl(input: GetQueueUrlCommandInput): Promise<GetQueueUrlCommandOutput>;
  sendMessage(input: SendMessageCommandInput): Promise<SendMessageCommandOutput>;
}

export interface SsmApi {
  getParameter(input: GetParameterCommandInput): Promise<GetParameterCommandOutput>;
}

export interface AwsClients {
  sageMaker: SageMakerApi;
  sqs: SqsApi;
  ssm: SsmApi;
}

/**
 * Credentials come from the default provider chain (the Lambda execution role in AWS).
 */
export function createAwsClients(region: string): AwsClients {
  return {
    sageMaker: new SageMaker({ region }),
    sqs: new SQS({ region }),
    ssm: new SSM({ region })
  };
}

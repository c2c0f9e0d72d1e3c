import {
  CreateEndpointCommandInput,
  CreateEndpointCommandOutput,
  CreateEndpointConfigCommandInput,
  CreateEndpointConfigCommandOutput,
  CreateModelCommandInput,
  CreateModelCommandOutput,
  ListTagsCommandInput,
  ListTagsCommandOutput,
  Tag
} from '@aws-sdk/client-sagemaker';
import {
  GetQueueUrlCommandInput,
  GetQueueUrlCommandOutput,
  SendMessageCommandInput,
  SendMessageCommandOutput
} from '@aws-sdk/client-sqs';
import { GetParameterCommandInput, GetParameterCommandOutput } from '@aws-sdk/client-ssm';

export const ACCOUNT_ID = '012345678901';
export const ROLE_ARN = `arn:aws:iam::${ACCOUNT_ID}:role/SageMakerRole`;
export const MODEL_ARN = `arn:aws:sagemaker:eu-west-2:${ACCOUNT_ID}:model/model`;
export const ENDPOINT_CONFIG_ARN = `arn:aws:sagemaker:eu-west-2:${ACCOUNT_ID}:endpoint-config/endpoint-config-name`;
export const ENDPOINT_ARN = `arn:aws:sagemaker:eu-west-2:${ACCOUNT_ID}:endpoint/endpoint-name`;
export const QUEUE_URL = `https://sqs.eu-west-2.amazonaws.com/${ACCOUNT_ID}/queue-name`;
export const ARTIFACT_KEY = '2024-02-23/output/xgboost-2024-02-23-18-04-06-024/output/model.tar.gz';

/** 2024-04-22 20:51:18 UTC */
export const FIXED_DATE = new Date(Date.UTC(2024, 3, 22, 20, 51, 18));
export const fixedClock = (): Date => FIXED_DATE;

export function exampleEvent(objectKey: string = ARTIFACT_KEY, eventName = 'ObjectCreated:Put') {
  return {
    Records: [
      {
        eventVersion: '2.0',
        eventSource: 'aws:s3',
        awsRegion: 'us-east-1',
        eventTime: '1970-01-01T00:00:00.000Z',
        eventName,
        userIdentity: { principalId: 'EXAMPLE' },
        s3: {
          s3SchemaVersion: '1.0',
          configurationId: 'testConfigRule',
          bucket: {
            name: 'example-bucket',
            ownerIdentity: { principalId: 'EXAMPLE' },
            arn: 'arn:aws:s3:::example-bucket'
          },
          object: {
            key: objectKey,
            size: 1024,
            eTag: '0123456789abcdef0123456789abcdef'
          }
        }
      }
    ]
  };
}

export const exampleTrainingJobTags = (): Tag[] => [
  { Key: 'Project', Value: 'MLOps' },
  { Key: 'Testing', Value: 's3://bucket-name/automl/2024-04-22/training/testing/test_21_51_18.csv' }
];

const metadata = { $metadata: {} };

export function fakeSageMaker() {
  return {
    createModel: jest.fn<Promise<CreateModelCommandOutput>, [CreateModelCommandInput]>()
      .mockResolvedValue({ ...metadata, ModelArn: MODEL_ARN }),
    createEndpointConfig: jest.fn<Promise<CreateEndpointConfigCommandOutput>, [CreateEndpointConfigCommandInput]>()
      .mockResolvedValue({ ...metadata, EndpointConfigArn: ENDPOINT_CONFIG_ARN }),
    createEndpoint: jest.fn<Promise<CreateEndpointCommandOutput>, [CreateEndpointCommandInput]>()
      .mockResolvedValue({ ...metadata, EndpointArn: ENDPOINT_ARN }),
    listTags: jest.fn<Promise<ListTagsCommandOutput>, [ListTagsCommandInput]>()
      .mockResolvedValue({ ...metadata, Tags: exampleTrainingJobTags() })
  };
}

export function fakeSqs() {
  return {
    getQueueUrl: jest.fn<Promise<GetQueueUrlCommandOutput>, [GetQueueUrlCommandInput]>()
      .mockResolvedValue({ ...metadata, QueueUrl: QUEUE_URL }),
    sendMessage: jest.fn<Promise<SendMessageCommandOutput>, [SendMessageCommandInput]>()
      .mockResolvedValue({ ...metadata, MessageId: 'message-id' })
  };
}

export function fakeSsm(value = ROLE_ARN) {
  return {
    getParameter: jest.fn<Promise<GetParameterCommandOutput>, [GetParameterCommandInput]>()
      .mockResolvedValue({ ...metadata, Parameter: { Name: 'parameter', Value: value } })
  };
}

export function fakeClients() {
  return {
    sageMaker: fakeSageMaker(),
    sqs: fakeSqs(),
    ssm: fakeSsm()
  };
}

// Deployment data types

/** The parts of a single notification record the deployment needs. */
export interface StorageEventRecord {
  eventName: string;
  bucketName: string;
  objectKey: string;
  awsRegion?: string;
}

export interface ResourceDescriptor {
  name: string;
  arn: string;
}

export type ModelDescriptor = ResourceDescriptor;
export type EndpointConfigDescriptor = ResourceDescriptor;
export type EndpointDescriptor = ResourceDescriptor;

export interface CapacityProfile {
  memoryMb: number;
  maxConcurrency: number;
}

/** Empty strings on both fields mean no test data could be found. */
export interface TestDataLocation {
  bucketName: string;
  objectKey: string;
}

/** Body of the message sent to the model evaluation queue. */
export interface EvaluationMessage {
  endpointName: string;
  testDataS3BucketName: string;
  testDataS3Key: string;
}

export interface DeploymentResult {
  trainingJobId: string;
  model: ModelDescriptor;
  endpointConfig: EndpointConfigDescriptor;
  endpoint: EndpointDescriptor;
  testData: TestDataLocation;
}

import { InvalidArtifactKeyError, InvalidS3UriError } from '../errors';
import { TestDataLocation } from '../types/events';

/**
 * Training output keys look like `<date>/<segment>/<training-job-id>/output/model.tar.gz`.
 * The job name is generated by the estimator from the image name and a timestamp and is
 * not stored anywhere else, so the key is the only record of it.
 */
const ARTIFACT_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}\/[A-Za-z0-9]+\/([^/]+)\/output\/model\.tar\.gz$/;

const S3_URI_PATTERN = /^s3:\/\/([^/]+)\/(.+)$/;

export interface ArnScope {
  partition: string;
  region: string;
  accountId: string;
}

export function locateTrainingJob(artifactObjectKey: string): string {
  const match = ARTIFACT_KEY_PATTERN.exec(artifactObjectKey);
  if (!match) {
    throw new InvalidArtifactKeyError(
      `Object key does not follow <date>/<segment>/<training-job>/output/model.tar.gz: ${artifactObjectKey}`,
      { objectKey: artifactObjectKey }
    );
  }
  return match[1];
}

export function trainingJobArn(scope: ArnScope, trainingJobId: string): string {
  return `arn:${scope.partition}:sagemaker:${scope.region}:${scope.accountId}:training-job/${trainingJobId}`;
}

/**
 * Splits `s3://bucket/key` into its parts. Both parts must be non-empty.
 */
export function parseS3Uri(uri: string): TestDataLocation {
  const match = S3_URI_PATTERN.exec(uri.trim());
  if (!match) {
    throw new InvalidS3UriError(`Not an s3://bucket/key URI: ${uri}`, { uri });
  }
  return { bucketName: match[1], objectKey: match[2] };
}

export function toS3Uri(bucketName: string, objectKey: string): string {
  return `s3://${bucketName}/${objectKey}`;
}

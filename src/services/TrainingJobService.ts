import { Tag } from '@aws-sdk/client-sagemaker';
import { TagMatchMode } from '../config';
import { InvalidS3UriError, TrainingJobLookupError, errorMessage } from '../errors';
import { TestDataLocation } from '../types/events';
import logger from '../utils/logger';
import { ArnScope, parseS3Uri, trainingJobArn } from '../utils/trainingJob';
import { SageMakerApi } from './clients';

/** Decides whether a training job tag points at the test dataset. */
export type TagMatcher = (tagKey: string) => boolean;

export const containsTagKey = (fragment: string): TagMatcher => tagKey => tagKey.includes(fragment);

export const exactTagKey = (name: string): TagMatcher => tagKey => tagKey === name;

export function tagMatcherFor(mode: TagMatchMode, key: string): TagMatcher {
  return mode === 'exact' ? exactTagKey(key) : containsTagKey(key);
}

export const EMPTY_TEST_DATA: TestDataLocation = { bucketName: '', objectKey: '' };

export class TrainingJobService {
  constructor(
    private readonly client: SageMakerApi,
    private readonly scope: ArnScope,
    private readonly matcher: TagMatcher = containsTagKey('Testing')
  ) {}

  /**
   * Finds the test dataset the training job was tagged with. The first tag accepted by the
   * matcher wins, in the order SageMaker lists them. A job without such a tag (or with an
   * unparseable value) yields empty bucket and key so evaluation can still run.
   */
  async getTestDataLocation(trainingJobId: string): Promise<TestDataLocation> {
    const resourceArn = trainingJobArn(this.scope, trainingJobId);
    const tags = await this.listTags(resourceArn);

    const tag = tags.find(candidate => candidate.Key !== undefined && this.matcher(candidate.Key));
    if (!tag) {
      logger.warn('Unable to find relevant tag(s) to determine test data location, empty values provided', {
        trainingJobId,
        tagCount: tags.length
      });
      return { ...EMPTY_TEST_DATA };
    }

    try {
      const location = parseS3Uri(tag.Value ?? '');
      logger.info(`Found test data tag ${tag.Key}`, {
        trainingJobId,
        testDataBucketName: location.bucketName,
        testDataKey: location.objectKey
      });
      return location;
    } catch (error) {
      if (error instanceof InvalidS3UriError) {
        logger.warn(`Test data tag ${tag.Key} does not hold an s3:// URI, empty values provided`, {
          trainingJobId,
          tagValue: tag.Value
        });
        return { ...EMPTY_TEST_DATA };
      }
      throw error;
    }
  }

  private async listTags(resourceArn: string): Promise<Tag[]> {
    const tags: Tag[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.client.listTags({ ResourceArn: resourceArn, NextToken: nextToken });
        tags.push(...(response.Tags ?? []));
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw new TrainingJobLookupError(`Failed to list tags for ${resourceArn}: ${errorMessage(error)}`, {
        resourceArn
      }, error);
    }

    return tags;
  }
}

import { TrainingJobLookupError } from '../../../src/errors';
import { TrainingJobService, exactTagKey, tagMatcherFor } from '../../../src/services/TrainingJobService';
import { ACCOUNT_ID, fakeSageMaker } from '../../fixtures';

const SCOPE = { partition: 'aws', region: 'eu-west-2', accountId: ACCOUNT_ID };
const JOB = 'xgboost-2024-04-22-20-51-18-610';

describe('TrainingJobService', () => {
  let client: ReturnType<typeof fakeSageMaker>;

  beforeEach(() => {
    client = fakeSageMaker();
  });

  test('reads the test data location from the Testing tag', async () => {
    const location = await new TrainingJobService(client, SCOPE).getTestDataLocation(JOB);

    expect(location).toEqual({
      bucketName: 'bucket-name',
      objectKey: 'automl/2024-04-22/training/testing/test_21_51_18.csv'
    });
    expect(client.listTags).toHaveBeenCalledWith({
      ResourceArn: `arn:aws:sagemaker:eu-west-2:${ACCOUNT_ID}:training-job/${JOB}`,
      NextToken: undefined
    });
  });

  test('takes the first tag whose key contains Testing', async () => {
    client.listTags.mockResolvedValue({
      $metadata: {},
      Tags: [
        { Key: 'Project', Value: 'MLOps' },
        { Key: 'TestingData', Value: 's3://first/test.csv' },
        { Key: 'Testing', Value: 's3://second/test.csv' }
      ]
    });

    const location = await new TrainingJobService(client, SCOPE).getTestDataLocation(JOB);

    expect(location).toEqual({ bucketName: 'first', objectKey: 'test.csv' });
  });

  test('an exact matcher skips partial matches', async () => {
    client.listTags.mockResolvedValue({
      $metadata: {},
      Tags: [
        { Key: 'TestingData', Value: 's3://first/test.csv' },
        { Key: 'Testing', Value: 's3://second/test.csv' }
      ]
    });

    const location = await new TrainingJobService(client, SCOPE, exactTagKey('Testing')).getTestDataLocation(JOB);

    expect(location).toEqual({ bucketName: 'second', objectKey: 'test.csv' });
  });

  test('returns empty values when no tag matches', async () => {
    client.listTags.mockResolvedValue({ $metadata: {}, Tags: [{ Key: 'Project', Value: 'MLOps' }] });

    await expect(new TrainingJobService(client, SCOPE).getTestDataLocation(JOB))
      .resolves.toEqual({ bucketName: '', objectKey: '' });
  });

  test('returns empty values when the job has no tags at all', async () => {
    client.listTags.mockResolvedValue({ $metadata: {} });

    await expect(new TrainingJobService(client, SCOPE).getTestDataLocation(JOB))
      .resolves.toEqual({ bucketName: '', objectKey: '' });
  });

  test('returns empty values when the tag does not hold an s3 URI', async () => {
    client.listTags.mockResolvedValue({ $metadata: {}, Tags: [{ Key: 'Testing', Value: 'bucket-name/test.csv' }] });

    await expect(new TrainingJobService(client, SCOPE).getTestDataLocation(JOB))
      .resolves.toEqual({ bucketName: '', objectKey: '' });
  });

  test('follows pagination', async () => {
    client.listTags
      .mockResolvedValueOnce({ $metadata: {}, Tags: [{ Key: 'Project', Value: 'MLOps' }], NextToken: 'page-2' })
      .mockResolvedValueOnce({ $metadata: {}, Tags: [{ Key: 'Testing', Value: 's3://bucket-name/test.csv' }] });

    const location = await new TrainingJobService(client, SCOPE).getTestDataLocation(JOB);

    expect(location).toEqual({ bucketName: 'bucket-name', objectKey: 'test.csv' });
    expect(client.listTags).toHaveBeenCalledTimes(2);
    expect(client.listTags.mock.calls[1][0].NextToken).toBe('page-2');
  });

  test('raises a lookup error when the tags cannot be listed', async () => {
    client.listTags.mockRejectedValue(new Error('AccessDeniedException'));

    await expect(new TrainingJobService(client, SCOPE).getTestDataLocation(JOB))
      .rejects.toBeInstanceOf(TrainingJobLookupError);
  });
});

describe('tagMatcherFor', () => {
  test('contains mode matches on a substring', () => {
    const matcher = tagMatcherFor('contains', 'Testing');

    expect(matcher('TestingDataLocation')).toBe(true);
    expect(matcher('Training')).toBe(false);
  });

  test('exact mode matches the whole key', () => {
    const matcher = tagMatcherFor('exact', 'Testing');

    expect(matcher('Testing')).toBe(true);
    expect(matcher('TestingDataLocation')).toBe(false);
  });
});

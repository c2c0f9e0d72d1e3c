import { NotificationError, errorMessage } from '../errors';
import { EvaluationMessage, TestDataLocation } from '../types/events';
import logger from '../utils/logger';
import { SqsApi } from './clients';

/**
 * Tells the model evaluation worker which endpoint to run predictions against.
 */
export class EvaluationNotifier {
  constructor(private readonly sqsClient: SqsApi) {}

  async notify(endpointName: string, testData: TestDataLocation, queueName: string): Promise<void> {
    const message: EvaluationMessage = {
      endpointName,
      testDataS3BucketName: testData.bucketName,
      testDataS3Key: testData.objectKey
    };

    try {
      const { QueueUrl: queueUrl } = await this.sqsClient.getQueueUrl({ QueueName: queueName });
      if (!queueUrl) {
        throw new Error(`No URL returned for queue ${queueName}`);
      }

      const result = await this.sqsClient.sendMessage({
        QueueUrl: queueUrl,
        MessageBody: JSON.stringify(message)
      });

      logger.info('Message sent to model evaluation queue', {
        queueName,
        endpointName,
        messageId: result.MessageId
      });
    } catch (error) {
      throw new NotificationError(`Failed to send evaluation message to ${queueName}: ${errorMessage(error)}`, {
        queueName,
        endpointName
      }, error);
    }
  }
}

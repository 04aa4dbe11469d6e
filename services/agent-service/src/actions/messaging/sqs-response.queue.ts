import { Logger } from '@nestjs/common';
import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  ReceiveMessageCommand,
  SQSClient,
} from '@aws-sdk/client-sqs';
import {
  QueueMessage,
  ReceiveOptions,
  ResponseQueue,
} from './response-queue.interface';

/**
 * SqsResponseQueue
 * Long-polling consumer of the agent response queue
 */
export class SqsResponseQueue implements ResponseQueue {
  private readonly logger = new Logger(SqsResponseQueue.name);

  constructor(
    private readonly client: SQSClient,
    private readonly queueUrl: string | undefined,
  ) {}

  async receive(options: ReceiveOptions): Promise<QueueMessage[]> {
    const result = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: this.requireQueueUrl(),
        MaxNumberOfMessages: options.maxMessages,
        WaitTimeSeconds: options.waitTimeSeconds,
        MessageAttributeNames: ['All'],
      }),
    );

    const messages: QueueMessage[] = [];
    for (const message of result.Messages ?? []) {
      if (message.Body === undefined || message.ReceiptHandle === undefined) {
        this.logger.warn(
          `Skipping SQS message ${message.MessageId ?? 'unknown'} ` +
            'without body or receipt handle',
        );
        continue;
      }
      messages.push({
        body: message.Body,
        receiptHandle: message.ReceiptHandle,
        messageId: message.MessageId,
      });
    }

    return messages;
  }

  async delete(receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: this.requireQueueUrl(),
        ReceiptHandle: receiptHandle,
      }),
    );
  }

  async release(receiptHandle: string): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: this.requireQueueUrl(),
        ReceiptHandle: receiptHandle,
        VisibilityTimeout: 0,
      }),
    );
  }

  async approximateDepth(): Promise<number> {
    const result = await this.client.send(
      new GetQueueAttributesCommand({
        QueueUrl: this.requireQueueUrl(),
        AttributeNames: ['ApproximateNumberOfMessages'],
      }),
    );

    const depth = parseInt(
      result.Attributes?.ApproximateNumberOfMessages ?? '0',
      10,
    );
    return isNaN(depth) ? 0 : depth;
  }

  private requireQueueUrl(): string {
    if (!this.queueUrl) {
      throw new Error('AGENT_RESPONSE_QUEUE_URL is not configured');
    }
    return this.queueUrl;
  }
}

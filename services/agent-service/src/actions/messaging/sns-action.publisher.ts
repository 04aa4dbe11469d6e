import { Logger } from '@nestjs/common';
import {
  MessageAttributeValue,
  PublishCommand,
  SNSClient,
} from '@aws-sdk/client-sns';
import {
  ActionAttributes,
  ActionEnvelope,
  ActionKind,
} from '../action-envelope';
import { ActionPublisher } from './action-publisher.interface';

export type ActionTopics = Record<ActionKind, string | undefined>;

/**
 * SnsActionPublisher
 *
 * Publishes action envelopes to SNS, one topic per action kind:
 * - web_action → web actions topic
 * - notify → notifications topic
 */
export class SnsActionPublisher implements ActionPublisher {
  private readonly logger = new Logger(SnsActionPublisher.name);

  constructor(
    private readonly client: SNSClient,
    private readonly topics: ActionTopics,
  ) {}

  /**
   * @throws Error when the kind has no topic or SNS rejects the publish
   */
  async publish(
    envelope: ActionEnvelope,
    attributes: ActionAttributes,
  ): Promise<string | undefined> {
    const topicArn = this.topics[envelope.message_type];
    if (!topicArn) {
      throw new Error(
        `No topic configured for ${envelope.message_type} actions`,
      );
    }

    const messageAttributes: Record<string, MessageAttributeValue> = {};
    for (const [name, value] of Object.entries(attributes)) {
      messageAttributes[name] = { DataType: 'String', StringValue: value };
    }

    const result = await this.client.send(
      new PublishCommand({
        TopicArn: topicArn,
        Message: JSON.stringify(envelope),
        MessageAttributes: messageAttributes,
      }),
    );

    this.logger.debug(
      `Published ${envelope.id} to ${topicArn} ` +
        `(sns id=${result.MessageId ?? 'n/a'})`,
    );

    return result.MessageId;
  }
}

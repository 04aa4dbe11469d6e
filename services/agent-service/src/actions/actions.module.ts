import { Module } from '@nestjs/common';
import { SNSClient } from '@aws-sdk/client-sns';
import { SQSClient } from '@aws-sdk/client-sqs';
import { GovernanceConfig } from '../config/governance.config';
import { ActionDispatcherService } from './action-dispatcher.service';
import { ResponsePollerService } from './response-poller.service';
import { SnsActionPublisher } from './messaging/sns-action.publisher';
import { SqsResponseQueue } from './messaging/sqs-response.queue';
import { ACTION_PUBLISHER, RESPONSE_QUEUE } from './messaging/tokens';

/**
 * ActionsModule
 *
 * Providers:
 * - ACTION_PUBLISHER: SNS, routed by action kind
 * - RESPONSE_QUEUE: SQS long polling
 * - ActionDispatcherService, ResponsePollerService
 */
@Module({
  providers: [
    {
      provide: ACTION_PUBLISHER,
      useFactory: (config: GovernanceConfig) =>
        new SnsActionPublisher(new SNSClient({ region: config.awsRegion }), {
          web_action: config.webActionsTopicArn,
          notify: config.notificationsTopicArn,
        }),
      inject: [GovernanceConfig],
    },
    {
      provide: RESPONSE_QUEUE,
      useFactory: (config: GovernanceConfig) =>
        new SqsResponseQueue(
          new SQSClient({ region: config.awsRegion }),
          config.responseQueueUrl,
        ),
      inject: [GovernanceConfig],
    },
    ActionDispatcherService,
    ResponsePollerService,
  ],
  exports: [ActionDispatcherService, ResponsePollerService],
})
export class ActionsModule {}

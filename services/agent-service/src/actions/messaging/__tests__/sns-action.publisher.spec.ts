import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { SnsActionPublisher } from '../sns-action.publisher';
import { buildActionEnvelope, actionAttributes } from '../../action-envelope';

describe('SnsActionPublisher', () => {
  let client: SNSClient;
  let send: jest.SpyInstance;
  let publisher: SnsActionPublisher;

  const createdAt = new Date(Date.UTC(2026, 2, 14, 9, 30, 0));

  beforeEach(() => {
    client = new SNSClient({ region: 'us-east-1' });
    send = jest
      .spyOn(client, 'send')
      .mockImplementation(async () => ({ MessageId: 'sns-42' }));
    publisher = new SnsActionPublisher(client, {
      web_action: 'arn:aws:sns:us-east-1:000000000000:web-actions-dev',
      notify: 'arn:aws:sns:us-east-1:000000000000:notifications-dev',
    });
  });

  afterEach(() => {
    send.mockRestore();
  });

  it('should route web actions to the web actions topic with string attributes', async () => {
    const envelope = buildActionEnvelope(
      'msg_1',
      { kind: 'web_action', target: 'https://a.example.com' },
      'dev',
      createdAt,
    );

    await expect(
      publisher.publish(envelope, actionAttributes(envelope)),
    ).resolves.toBe('sns-42');

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PublishCommand);
    expect(command.input).toEqual({
      TopicArn: 'arn:aws:sns:us-east-1:000000000000:web-actions-dev',
      Message: JSON.stringify(envelope),
      MessageAttributes: {
        stage: { DataType: 'String', StringValue: 'dev' },
        message_type: { DataType: 'String', StringValue: 'web_action' },
        created_by: { DataType: 'String', StringValue: 'agent' },
      },
    });
  });

  it('should route notifications to the notifications topic', async () => {
    const envelope = buildActionEnvelope(
      'msg_2',
      { kind: 'notify', arguments: { message: 'hi' } },
      'dev',
      createdAt,
    );

    await publisher.publish(envelope, actionAttributes(envelope));

    expect(send.mock.calls[0][0].input.TopicArn).toBe(
      'arn:aws:sns:us-east-1:000000000000:notifications-dev',
    );
  });

  it('should fail when the kind has no topic', async () => {
    publisher = new SnsActionPublisher(client, {
      web_action: undefined,
      notify: undefined,
    });
    const envelope = buildActionEnvelope(
      'msg_3',
      { kind: 'notify' },
      'dev',
      createdAt,
    );

    await expect(
      publisher.publish(envelope, actionAttributes(envelope)),
    ).rejects.toThrow('No topic configured for notify actions');
    expect(send).not.toHaveBeenCalled();
  });

  it('should propagate SNS errors', async () => {
    send.mockImplementation(async () => {
      throw new Error('AuthorizationError');
    });
    const envelope = buildActionEnvelope(
      'msg_4',
      { kind: 'web_action' },
      'dev',
      createdAt,
    );

    await expect(
      publisher.publish(envelope, actionAttributes(envelope)),
    ).rejects.toThrow('AuthorizationError');
  });
});

import { ActionAttributes, ActionEnvelope } from '../action-envelope';

/**
 * ActionPublisher
 *
 * Outbound side of the message bus. Implementations route by
 * `envelope.message_type` and attach the attributes for subscriber filtering.
 */
export interface ActionPublisher {
  /**
   * @returns transport message id, when the bus reports one
   * @throws Error when the bus rejects the message
   */
  publish(
    envelope: ActionEnvelope,
    attributes: ActionAttributes,
  ): Promise<string | undefined>;
}

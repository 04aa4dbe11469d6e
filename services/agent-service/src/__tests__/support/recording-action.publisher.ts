import { ActionAttributes, ActionEnvelope } from '../../actions/action-envelope';
import { ActionPublisher } from '../../actions/messaging/action-publisher.interface';

export interface PublishedAction {
  envelope: ActionEnvelope;
  attributes: ActionAttributes;
}

export class RecordingActionPublisher implements ActionPublisher {
  readonly published: PublishedAction[] = [];
  publishError?: Error;
  /** Runs after a successful publish, e.g. to enqueue the executor's response */
  onPublish?: (envelope: ActionEnvelope) => void;

  async publish(
    envelope: ActionEnvelope,
    attributes: ActionAttributes,
  ): Promise<string | undefined> {
    if (this.publishError) {
      throw this.publishError;
    }
    this.published.push({ envelope, attributes });
    this.onPublish?.(envelope);
    return `sns-${this.published.length}`;
  }
}

export interface QueueMessage {
  body: string;
  /** Handle required to delete this delivery */
  receiptHandle: string;
  messageId?: string;
}

export interface ReceiveOptions {
  maxMessages: number;
  waitTimeSeconds: number;
}

/**
 * ResponseQueue
 * Inbound side of the message bus (executor responses)
 */
export interface ResponseQueue {
  receive(options: ReceiveOptions): Promise<QueueMessage[]>;

  delete(receiptHandle: string): Promise<void>;

  /** Make a received message visible to other consumers again */
  release(receiptHandle: string): Promise<void>;

  /** Approximate number of visible messages */
  approximateDepth(): Promise<number>;
}

/**
 * Dependency Injection Tokens
 */

/** @Inject(ACTION_PUBLISHER) private readonly publisher: ActionPublisher */
export const ACTION_PUBLISHER = 'ACTION_PUBLISHER';

/** @Inject(RESPONSE_QUEUE) private readonly queue: ResponseQueue */
export const RESPONSE_QUEUE = 'RESPONSE_QUEUE';

import { CostProjection } from '../spend/spend.types';

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface TurnInput {
  message: string;
  history?: ChatTurn[];
}

/**
 * TurnResult
 *
 * - completed: the model produced a final reply
 * - pending_actions: actions were submitted but no response arrived in time
 * - spend_cap_exceeded: the daily cap rejected a model call; not retried
 */
export type TurnResult =
  | {
      status: 'completed' | 'pending_actions';
      reply: string;
      actionIds: string[];
      pendingActionIds: string[];
      degraded: boolean;
    }
  | {
      status: 'spend_cap_exceeded';
      reply: string;
      actionIds: string[];
      pendingActionIds: string[];
      cost: CostProjection;
    };

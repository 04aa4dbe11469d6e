import { Stage } from '../config/governance.config';

export type ActionKind = 'web_action' | 'notify';

export type ActionStatus =
  | 'created'
  | 'queued'
  | 'processing'
  | 'completed'
  | 'failed';

export const ACTION_CREATED_BY = 'agent';

export const ACTION_PAYLOAD_VERSION = '1.0';

/**
 * ActionAuthConfig
 * Credentials reference handed to the executor; never the secret itself
 */
export interface ActionAuthConfig {
  type: string;
  tokenUrl?: string;
  secretName?: string;
  jwksUrl?: string;
}

/**
 * ActionRequest
 *
 * target: URL for web actions, optional channel for notifications
 * operation: executor-specific verb (e.g. "fetch", "search_tee_times")
 */
export interface ActionRequest {
  kind: ActionKind;
  target?: string;
  operation?: string;
  arguments?: Record<string, unknown>;
  authConfig?: ActionAuthConfig;
}

/**
 * ActionEnvelope
 * Wire format published to the bus (snake_case, shared with the executors)
 */
export interface ActionEnvelope {
  id: string;
  created_date: string;
  created_by: string;
  stage: Stage;
  message_type: ActionKind;
  status: ActionStatus;
  /** JSON-encoded ActionPayload */
  payload: string;
  retry_count: number;
  /** Executors echo this on their response */
  correlation_id: string;
}

export interface ActionPayload {
  version: string;
  target?: string;
  operation?: string;
  arguments: Record<string, unknown>;
  auth_config?: {
    type: string;
    token_url?: string;
    secret_name?: string;
    jwks_url?: string;
  };
  stage: Stage;
  message_type: ActionKind;
}

/**
 * Routing attributes attached to every published action
 */
export type ActionAttributes = Record<
  'stage' | 'message_type' | 'created_by',
  string
>;

export function buildActionEnvelope(
  id: string,
  request: ActionRequest,
  stage: Stage,
  createdAt: Date,
): ActionEnvelope {
  const payload: ActionPayload = {
    version: ACTION_PAYLOAD_VERSION,
    target: request.target,
    operation: request.operation,
    arguments: request.arguments ?? {},
    stage,
    message_type: request.kind,
  };

  if (request.authConfig) {
    payload.auth_config = {
      type: request.authConfig.type,
      token_url: request.authConfig.tokenUrl,
      secret_name: request.authConfig.secretName,
      jwks_url: request.authConfig.jwksUrl,
    };
  }

  return {
    id,
    created_date: createdAt.toISOString(),
    created_by: ACTION_CREATED_BY,
    stage,
    message_type: request.kind,
    status: 'created',
    payload: JSON.stringify(payload),
    retry_count: 0,
    correlation_id: id,
  };
}

export function actionAttributes(envelope: ActionEnvelope): ActionAttributes {
  return {
    stage: envelope.stage,
    message_type: envelope.message_type,
    created_by: envelope.created_by,
  };
}

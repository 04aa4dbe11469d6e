/**
 * Jest setup: keep provider credentials from the host shell out of specs,
 * so provider selection only sees the variables each spec supplies.
 */
delete process.env.ANTHROPIC_API_KEY;
delete process.env.OPENAI_API_KEY;
delete process.env.AI_PROVIDER;
delete process.env.MODEL_ID;

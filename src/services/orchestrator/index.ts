// Orchestrator Module

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export { HttpToolChannel } from './channel.js';
export type { ToolChannel } from './channel.js';
export { ToolExecutor } from './executor.js';
export { parseDecision, parseFunctionCallLines, stripCodeFences } from './parser.js';
export { buildSystemPrompt, formatToolCatalog } from './prompts.js';
export { RunLog } from './run-log.js';
export type * from './types.js';

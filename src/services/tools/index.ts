// Tool System Initialization
// Builds the finance tool catalog in priority order, then freezes it

import { ToolRegistry } from './registry.js';
import { createEmployeeLookupTool } from './employee-lookup-tool.js';
import { createPolicySearchTool } from './policy-search-tool.js';
import type { PolicySearchOptions } from './policy-search-tool.js';
import { createReimbursementSummaryTool } from './reimbursement-summary-tool.js';
import { createReimbursementStatusTool } from './reimbursement-status-tool.js';
import { createReimbursementRecordsTool } from './reimbursement-records-tool.js';
import { createWorkOrderTool } from './work-order-tool.js';
import { createDraftContentTool } from './draft-content-tool.js';
import { createSendEmailTool } from './send-email-tool.js';
import type { FinanceStore } from '../finance-store.js';
import type { PolicySearch } from '../retrieval.js';
import type { TextGenerator } from '../generation.js';
import type { Mailer } from '../mailer.js';
import { childLogger } from '../../utils/logger.js';

const log = childLogger('tools');

export { ToolRegistry } from './registry.js';
export { ToolFailureError } from './failures.js';
export { FailureKind } from './types.js';
export type {
  ArgValue,
  FailureDetail,
  SourceAttribution,
  ToolArgs,
  ToolCategory,
  ToolDefinition,
  ToolEffect,
  ToolParameter,
  ToolResult,
} from './types.js';

export interface ToolDependencies {
  store: FinanceStore;
  policies: PolicySearch;
  retrieval: PolicySearchOptions;
  generator?: TextGenerator;
  mailer?: Mailer;
}

/**
 * Registration order is the tie-break between producers of the same export,
 * and the order the planner lays steps out in.
 */
export function createDefaultRegistry(deps: ToolDependencies): ToolRegistry {
  const registry = new ToolRegistry();

  registry.register(createEmployeeLookupTool(deps.store));
  registry.register(createPolicySearchTool(deps.policies, deps.retrieval));
  registry.register(createReimbursementSummaryTool(deps.store));
  registry.register(createReimbursementStatusTool(deps.store));
  registry.register(createReimbursementRecordsTool(deps.store));
  registry.register(createWorkOrderTool(deps.store));

  if (deps.generator) {
    registry.register(createDraftContentTool(deps.generator));
  } else {
    log.info('No language model configured; draft_content disabled');
  }

  if (deps.mailer) {
    registry.register(createSendEmailTool(deps.mailer));
  } else {
    log.info('MAIL_WEBHOOK_URL not set; send_email disabled');
  }

  log.info({ tools: registry.list().map(t => t.name) }, `Tool registry initialized with ${registry.size} tool(s)`);
  return registry.freeze();
}

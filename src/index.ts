export * from './types/session.js';
export * from './config/index.js';
export * from './utils/errors.js';
export * from './utils/mac.js';
export { logger, createChildLogger } from './utils/logger.js';
export * from './core/session-parser.js';
export * from './core/session-classifier.js';
export * from './core/session-collector.js';
export * from './infra/cisco-ssh-session.js';
export * from './infra/mac-vendor-client.js';
export * from './infra/ise-client.js';
export * from './infra/snapshot-store.js';
export * from './auditor/actions.js';
export { AccessAuditor, type AuditorDependencies } from './auditor/access-auditor.js';

import { AccessAuditor } from './auditor/access-auditor.js';

export default AccessAuditor;

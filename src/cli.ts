#!/usr/bin/env node
import { AccessAuditor } from './auditor/access-auditor.js';
import { AuditActionSchema, type AuditAction } from './auditor/actions.js';
import { loadConfigFromEnv, type Config } from './config/index.js';
import { errorMessage } from './utils/errors.js';

function printUsage(): void {
  console.log(`
Usage: access-audit <action> [params-json]

Actions:
  collect_sessions <json>         Collect failed access sessions (needs switchHost)
  get_last_snapshot               Show the last stored collection result
  list_endpoint_groups            List endpoint groups in the policy engine
  get_endpoint_group <json>       Current group of an endpoint (needs macAddress)
  search_endpoint <json>          Same, accepting any MAC notation (needs macAddress)
  update_endpoint_group <json>    Reassign an endpoint (needs macAddress, groupId)

Examples:
  access-audit collect_sessions '{"switchHost":"10.0.0.2"}'
  access-audit search_endpoint '{"macAddress":"00:50:56:99:12:34"}'
  access-audit update_endpoint_group '{"macAddress":"0050.5699.1234","groupId":"group-id"}'

Environment:
  SWITCH_USERNAME, SWITCH_PASSWORD, SWITCH_SECRET   Switch login and enable secret
  SWITCH_SSH_PORT                                   SSH port (default 22)
  ISE_USERNAME, ISE_PASSWORD, ISE_BASE_URL          Policy engine ERS access
  ISE_VERIFY_TLS                                    Verify ISE certificate (default false)
  MAC_VENDOR_URL                                    Vendor lookup service
  SNAPSHOT_PATH                                     Snapshot file (default static/result.json)
  LOG_LEVEL                                         trace|debug|info|warn|error|fatal|silent
`);
}

function fail(payload: Record<string, unknown>): never {
  console.error(JSON.stringify({ success: false, ...payload }, null, 2));
  process.exit(1);
}

async function main(): Promise<void> {
  const action = process.argv[2];
  const paramsRaw = process.argv[3];

  if (!action || action === '--help' || action === '-h') {
    printUsage();
    process.exit(action ? 0 : 1);
  }

  // LOG_LEVEL itself is applied when the logger module loads; this rejects unknown values
  let config: Config;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    fail({ error: errorMessage(err) });
  }

  let params: unknown = undefined;
  if (paramsRaw) {
    try {
      params = JSON.parse(paramsRaw);
    } catch {
      fail({ error: `Invalid JSON params: ${paramsRaw}` });
    }
  }

  const parsed = AuditActionSchema.safeParse({ action, params });
  if (!parsed.success) {
    fail({
      error: `Invalid action or params: ${parsed.error.issues.map(i => i.message).join('; ')}`,
      action,
      params,
    });
  }
  const request: AuditAction = parsed.data;

  const auditor = new AccessAuditor(config);
  const result = await auditor.execute(request);

  console.log(JSON.stringify(result, null, 2));
  process.exit(result.success ? 0 : 1);
}

main().catch((err: unknown) => {
  fail({ error: `Unexpected error: ${errorMessage(err)}` });
});

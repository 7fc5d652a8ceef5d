// This module turns upstream Google Ads failures into actionable JSON-RPC error messages.

import { AdsApiError, AppError } from '../utils/errors.js';

export type UpstreamFault =
  | 'not_ads_user'
  | 'authentication'
  | 'missing_required_field'
  | 'invalid_customer_id'
  | 'invalid_query';

export const REMEDIATIONS: Record<UpstreamFault, string> = {
  not_ads_user:
    'The Google account behind the configured refresh token is not linked to any Google Ads account (NOT_ADS_USER). ' +
    'Generate a new refresh token while signed in as a user with Google Ads access, or grant this user access in the Google Ads UI.',
  authentication:
    'Authentication with the Google Ads API failed. Verify GOOGLE_ADS_CLIENT_ID, GOOGLE_ADS_CLIENT_SECRET, GOOGLE_ADS_REFRESH_TOKEN ' +
    'and GOOGLE_ADS_DEVELOPER_TOKEN. When the customer is managed through a manager account, set GOOGLE_ADS_LOGIN_CUSTOMER_ID to the manager id.',
  missing_required_field:
    'A required argument is missing. The search tool needs customer_id, resource and fields, for example ' +
    '{"customer_id": "1234567890", "resource": "campaign", "fields": ["campaign.id", "campaign.name"]}.',
  invalid_customer_id:
    'customer_id must be the numeric Google Ads customer id without dashes, for example "1234567890". ' +
    'Call list_accessible_customers to see the ids this user can query.',
  invalid_query:
    'The query arguments were rejected. Check that resource is a GAQL resource such as "campaign" or "ad_group", ' +
    'that every field and condition uses fields of that resource, and that limit is a positive integer.'
};

// Structured codes reported by the Ads API or raised by the tools themselves.
const FAULT_BY_CODE = new Map<string, UpstreamFault>(
  Object.entries({
    NOT_ADS_USER: 'not_ads_user',
    USER_PERMISSION_DENIED: 'authentication',
    CUSTOMER_NOT_ENABLED: 'authentication',
    DEVELOPER_TOKEN_NOT_APPROVED: 'authentication',
    DEVELOPER_TOKEN_PROHIBITED: 'authentication',
    OAUTH_TOKEN_INVALID: 'authentication',
    OAUTH_TOKEN_EXPIRED: 'authentication',
    AUTHENTICATION_ERROR: 'authentication',
    UNAUTHENTICATED: 'authentication',
    PERMISSION_DENIED: 'authentication',
    INVALID_CUSTOMER_ID: 'invalid_customer_id',
    QUERY_ERROR: 'invalid_query',
    UNRECOGNIZED_FIELD: 'invalid_query',
    INVALID_ARGUMENT: 'invalid_query',
    REQUIRED_FIELD_MISSING: 'missing_required_field',
    ads_auth_failed: 'authentication',
    ads_client_init_failed: 'authentication',
    missing_required_field: 'missing_required_field',
    invalid_customer_id: 'invalid_customer_id',
    invalid_arguments: 'invalid_query'
  } satisfies Record<string, UpstreamFault>)
);

// Ordered: account linkage wins over generic auth, and missing fields win over malformed ids.
const FAULT_PATTERNS: Array<{ fault: UpstreamFault; patterns: RegExp[] }> = [
  { fault: 'not_ads_user', patterns: [/NOT_ADS_USER/, /not associated with any ads accounts/i] },
  {
    fault: 'authentication',
    patterns: [/USER_PERMISSION_DENIED/, /invalid_grant/, /unauthenticated/i, /authentication/i, /oauth/i]
  },
  {
    fault: 'missing_required_field',
    patterns: [/REQUIRED_FIELD_MISSING/, /missing required/i, /required (field|argument)/i, /is required/i]
  },
  { fault: 'invalid_customer_id', patterns: [/INVALID_CUSTOMER_ID/, /invalid customer[ _]id/i, /customer_id/] },
  { fault: 'invalid_query', patterns: [/QUERY_ERROR/, /INVALID_ARGUMENT/, /unrecognized field/i, /invalid (query|argument)/i] }
];

// This helper resolves structured fault codes before falling back to message matching.
export function detectUpstreamFault(error: unknown): UpstreamFault | null {
  if (error instanceof AdsApiError) {
    for (const code of error.errorCodes) {
      const fault = FAULT_BY_CODE.get(code);
      if (fault) {
        return fault;
      }
    }
  }

  if (error instanceof AppError) {
    const fault = FAULT_BY_CODE.get(error.code);
    if (fault) {
      return fault;
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  for (const entry of FAULT_PATTERNS) {
    if (entry.patterns.some((pattern) => pattern.test(message))) {
      return entry.fault;
    }
  }

  return null;
}

export interface ToolErrorDescription {
  message: string;
  fault: UpstreamFault | null;
}

export function describeToolError(toolName: string, error: unknown): ToolErrorDescription {
  const reason = error instanceof Error ? error.message : String(error);
  const fault = detectUpstreamFault(error);
  const base = `Error executing tool ${toolName}: ${reason}`;

  return {
    message: fault ? `${base}\n\n${REMEDIATIONS[fault]}` : base,
    fault
  };
}

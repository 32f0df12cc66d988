/**
 * Errors Module
 *
 * Error taxonomy for the crawl/scrape pipeline and the static table that maps
 * technical reason codes (e.g. `http_402`, `circuit_breaker_open`) to operator
 * messages and remediation actions.
 *
 * Expected failures never travel as exceptions: they are carried in result
 * values with an {@link ErrorCode} and a reason code from the table below.
 */

/**
 * Machine-readable failure kinds
 */
export type ErrorCode =
  | 'invalid_url'
  | 'no_api_key'
  | 'rate_limited'
  | 'circuit_open'
  | 'request_timeout'
  | 'network_error'
  | 'http_error'
  | 'api_failure'
  | 'no_job_id'
  | 'crawl_failed'
  | 'crawl_timeout'
  | 'discovery_error'
  | 'scrape_error';

export type ErrorCategory =
  | 'payment'
  | 'rate_limit'
  | 'timeout'
  | 'server_error'
  | 'authentication'
  | 'authorization'
  | 'not_found'
  | 'circuit_breaker'
  | 'network'
  | 'configuration'
  | 'validation'
  | 'crawl_error'
  | 'api_error'
  | 'scrape_error';

export type ErrorAction =
  | 'add_credits'
  | 'wait_and_retry'
  | 'contact_support'
  | 'check_api_key'
  | 'check_permissions'
  | 'check_url'
  | 'add_api_key'
  | 'check_configuration'
  | 'check_connection';

export type Severity = 'low' | 'medium' | 'high';

export interface ErrorInfo {
  message: string;
  category: ErrorCategory;
  action: ErrorAction;
  severity: Severity;
}

export interface ActionGuidance {
  title: string;
  description: string;
  url: string | null;
}

/**
 * Thrown for faults that are not part of the expected failure taxonomy
 * (misconfiguration, violated preconditions).
 */
export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
  }
}

// ============================================================================
// Message Table
// ============================================================================

const ERROR_MESSAGES: Record<string, ErrorInfo> = {
  http_402: {
    message: 'API credits exhausted. Add credits to the crawl backend account to continue web scraping.',
    category: 'payment',
    action: 'add_credits',
    severity: 'high',
  },
  http_429: {
    message: 'Rate limit exceeded. The API is temporarily throttling requests.',
    category: 'rate_limit',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_408: {
    message: 'Request timeout. The server took too long to respond, possibly due to high load or rate limiting.',
    category: 'timeout',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_500: {
    message: 'Internal server error. The API service is experiencing technical difficulties.',
    category: 'server_error',
    action: 'contact_support',
    severity: 'high',
  },
  http_502: {
    message: 'Bad gateway. The API service is temporarily unavailable.',
    category: 'server_error',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_503: {
    message: 'Service unavailable. The API is temporarily down for maintenance.',
    category: 'server_error',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_504: {
    message: 'Gateway timeout. The API service is not responding.',
    category: 'server_error',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_401: {
    message: 'Authentication failed. Check the API key configuration.',
    category: 'authentication',
    action: 'check_api_key',
    severity: 'high',
  },
  http_403: {
    message: 'Access forbidden. The API key may lack required permissions.',
    category: 'authorization',
    action: 'check_permissions',
    severity: 'high',
  },
  http_404: {
    message: 'URL not found. The requested resource could not be located.',
    category: 'not_found',
    action: 'check_url',
    severity: 'low',
  },
  circuit_breaker_open: {
    message: 'Circuit breaker activated due to repeated API failures. Requests are paused to let the service recover.',
    category: 'circuit_breaker',
    action: 'wait_and_retry',
    severity: 'high',
  },
  request_timeout: {
    message: 'Request timeout after multiple retries. The service may be overloaded.',
    category: 'timeout',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  http_error: {
    message: 'Network or HTTP communication error occurred during the request.',
    category: 'network',
    action: 'check_connection',
    severity: 'medium',
  },
  no_api_key: {
    message: 'No API key provided. Running in fallback mode with limited functionality.',
    category: 'configuration',
    action: 'add_api_key',
    severity: 'low',
  },
  invalid_url: {
    message: 'The provided URL is invalid or malformed.',
    category: 'validation',
    action: 'check_url',
    severity: 'low',
  },
  skipped: {
    message: 'Operation skipped due to missing configuration or API key.',
    category: 'configuration',
    action: 'check_configuration',
    severity: 'low',
  },
  crawl_failed: {
    message: 'Crawl job failed to complete. The website may be inaccessible or have restrictions.',
    category: 'crawl_error',
    action: 'check_url',
    severity: 'medium',
  },
  crawl_timeout: {
    message: 'Crawl job timed out. The website may be very large or slow to respond.',
    category: 'timeout',
    action: 'wait_and_retry',
    severity: 'medium',
  },
  no_job_id: {
    message: 'Failed to start crawl job. The API did not return a job identifier.',
    category: 'api_error',
    action: 'contact_support',
    severity: 'high',
  },
  discovery_error: {
    message: 'URL discovery failed unexpectedly. Only the submitted URL was analyzed.',
    category: 'crawl_error',
    action: 'contact_support',
    severity: 'medium',
  },
  api_failure: {
    message: 'The API reported the request as unsuccessful.',
    category: 'api_error',
    action: 'contact_support',
    severity: 'medium',
  },
  scrape_error: {
    message: 'Content could not be extracted from the page.',
    category: 'scrape_error',
    action: 'check_url',
    severity: 'low',
  },
};

const ACTION_GUIDANCE: Record<ErrorAction, ActionGuidance> = {
  add_credits: {
    title: 'Add API Credits',
    description: 'Purchase additional API credits from the crawl backend dashboard',
    url: 'https://firecrawl.dev/dashboard',
  },
  wait_and_retry: {
    title: 'Wait and Retry',
    description: 'Wait a few minutes before trying again to allow the service to recover',
    url: null,
  },
  contact_support: {
    title: 'Contact Support',
    description: 'Reach out to API support if the issue persists',
    url: 'https://firecrawl.dev/support',
  },
  check_api_key: {
    title: 'Check API Key',
    description: 'Verify the FIRECRAWL_API_KEY environment variable',
    url: null,
  },
  check_permissions: {
    title: 'Check Permissions',
    description: 'Ensure the API key has the required permissions for this operation',
    url: null,
  },
  check_url: {
    title: 'Check URL',
    description: 'Verify the URL is correct, accessible, and properly formatted',
    url: null,
  },
  add_api_key: {
    title: 'Add API Key',
    description: 'Set FIRECRAWL_API_KEY for full functionality',
    url: 'https://firecrawl.dev/dashboard',
  },
  check_configuration: {
    title: 'Check Configuration',
    description: 'Verify all required configuration settings are properly set',
    url: null,
  },
  check_connection: {
    title: 'Check Connection',
    description: 'Verify network connectivity to the API',
    url: null,
  },
};

const SEVERITY_PRIORITY: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
};

const PAYMENT_CODES = new Set(['http_402', 'http_401', 'http_403']);
const RATE_LIMIT_CODES = new Set(['http_429', 'http_408', 'request_timeout']);

// ============================================================================
// Lookups
// ============================================================================

/**
 * Get human-readable error information for a reason code
 */
export function getErrorInfo(reason: string): ErrorInfo | undefined {
  return ERROR_MESSAGES[reason];
}

export function getActionGuidance(action: ErrorAction): ActionGuidance {
  return ACTION_GUIDANCE[action];
}

/**
 * Format the operator message for a reason code, optionally followed by the
 * remediation description.
 */
export function formatErrorMessage(reason: string, includeAction = true): string {
  const info = getErrorInfo(reason);
  if (!info) {
    return `Unknown error: ${reason}`;
  }
  if (!includeAction) {
    return info.message;
  }
  return `${info.message} ${getActionGuidance(info.action).description}.`;
}

/**
 * Reason code for an HTTP status
 */
export function httpReason(status: number): string {
  return `http_${status}`;
}

/**
 * Group reason codes by category; unknown codes are ignored
 */
export function categorizeErrors(reasons: string[]): Partial<Record<ErrorCategory, string[]>> {
  const categories: Partial<Record<ErrorCategory, string[]>> = {};
  for (const reason of reasons) {
    const info = getErrorInfo(reason);
    if (!info) continue;
    const bucket = categories[info.category] ?? [];
    bucket.push(reason);
    categories[info.category] = bucket;
  }
  return categories;
}

/**
 * Severity and priority for a reason code; unknown codes rate as medium
 */
export function getSeverityLevel(reason: string): { severity: Severity; priority: number } {
  const severity = getErrorInfo(reason)?.severity ?? 'medium';
  return { severity, priority: SEVERITY_PRIORITY[severity] };
}

export interface ErrorSummary {
  has_errors: boolean;
  total_errors: number;
  error_codes: string[];
  categories: Partial<Record<ErrorCategory, string[]>>;
  has_payment_issues: boolean;
  payment_errors: string[];
  has_rate_limit_issues: boolean;
  rate_limit_errors: string[];
  max_severity: Severity | null;
  recommended_actions: ErrorAction[];
  user_message: string | null;
}

/**
 * Summarize the reason codes collected during one run for operators
 */
export function createErrorSummary(reasons: string[]): ErrorSummary {
  if (reasons.length === 0) {
    return {
      has_errors: false,
      total_errors: 0,
      error_codes: [],
      categories: {},
      has_payment_issues: false,
      payment_errors: [],
      has_rate_limit_issues: false,
      rate_limit_errors: [],
      max_severity: null,
      recommended_actions: [],
      user_message: null,
    };
  }

  const categories = categorizeErrors(reasons);
  const paymentErrors = reasons.filter((reason) => PAYMENT_CODES.has(reason));
  const rateLimitErrors = reasons.filter((reason) => RATE_LIMIT_CODES.has(reason));

  let maxSeverity: Severity = 'low';
  const actions: ErrorAction[] = [];
  for (const reason of reasons) {
    const { severity } = getSeverityLevel(reason);
    if (SEVERITY_PRIORITY[severity] > SEVERITY_PRIORITY[maxSeverity]) {
      maxSeverity = severity;
    }
    const action = getErrorInfo(reason)?.action;
    if (action && !actions.includes(action)) {
      actions.push(action);
    }
  }

  return {
    has_errors: true,
    total_errors: reasons.length,
    error_codes: reasons,
    categories,
    has_payment_issues: paymentErrors.length > 0,
    payment_errors: paymentErrors,
    has_rate_limit_issues: rateLimitErrors.length > 0,
    rate_limit_errors: rateLimitErrors,
    max_severity: maxSeverity,
    recommended_actions: actions,
    user_message: buildUserMessage(categories, paymentErrors.length > 0, rateLimitErrors.length > 0),
  };
}

function buildUserMessage(
  categories: Partial<Record<ErrorCategory, string[]>>,
  hasPayment: boolean,
  hasRateLimit: boolean
): string {
  if (hasPayment) {
    return 'Some operations failed due to API credit exhaustion or authentication issues. Check API credits and key configuration.';
  }
  if (hasRateLimit) {
    return 'Some operations were rate limited or timed out. The API may be under high load; wait and retry.';
  }
  if (categories.server_error) {
    return 'Some operations failed due to server issues at the API provider.';
  }
  if (categories.configuration) {
    return 'Some operations were skipped due to missing configuration. Check the API key and settings.';
  }
  const names = Object.keys(categories);
  return names.length > 0
    ? `Some operations encountered errors in the following areas: ${names.join(', ')}.`
    : 'Some operations encountered unrecognized errors.';
}

export type AuditEventType = 'plan_created' | 'day_advanced' | 'tick_skipped' | 'llm_request' | 'error';

export interface AuditLogEntry {
  timestamp: number;
  requestId?: string;
  eventType: AuditEventType;
  data: Record<string, unknown>;
}

export interface AuditLogger {
  log(entry: AuditLogEntry): void | Promise<void>;
}

export interface RedactionOptions {
  /**
   * Extra field names to redact (case-insensitive partial match), added to the defaults.
   */
  sensitiveFields?: string[];
}

export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditLogEntry): void {
    const logLine = JSON.stringify({
      ...entry,
      timestamp: new Date(entry.timestamp).toISOString()
    });
    console.log(`[AUDIT] ${logLine}`);
  }
}

/** Collects entries in memory for inspection. */
export class InMemoryAuditLogger implements AuditLogger {
  readonly entries: AuditLogEntry[] = [];

  log(entry: AuditLogEntry): void {
    this.entries.push(entry);
  }

  ofType(eventType: AuditEventType): AuditLogEntry[] {
    return this.entries.filter((entry) => entry.eventType === eventType);
  }
}

const DEFAULT_SENSITIVE_FIELDS = [
  'password',
  'secret',
  'apikey',
  'api_key',
  'token',
  'authorization',
  'bearer',
  'credential',
  'cookie'
];

function sensitiveFieldsFor(options: RedactionOptions): string[] {
  return options.sensitiveFields ? [...DEFAULT_SENSITIVE_FIELDS, ...options.sensitiveFields] : DEFAULT_SENSITIVE_FIELDS;
}

/**
 * Masks `field: value` / `field=value` pairs for sensitive fields and long
 * token-like strings (API keys, bearer tokens). UUIDs are kept.
 */
export function redactString(text: string, options: RedactionOptions = {}): string {
  let redacted = text;

  for (const field of sensitiveFieldsFor(options)) {
    const regex = new RegExp(`(${field}\\s*[:=]\\s*)([^\\s,;}\\]\\)]+)`, 'gi');
    redacted = redacted.replace(regex, (match: string, prefix: string, value: string) =>
      value.length > 8 || /[-_]/.test(value) ? `${prefix}[REDACTED]` : match
    );
  }

  return redacted.replace(/\b([a-zA-Z0-9_-]{32,})\b/g, (match) =>
    /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(match) ? match : '[REDACTED]'
  );
}

export function redactObject(value: unknown, options: RedactionOptions = {}, visited: WeakSet<object> = new WeakSet()): unknown {
  if (typeof value === 'string') {
    return redactString(value, options);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactObject(item, options, visited));
  }

  const fields = sensitiveFieldsFor(options);
  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    result[key] = fields.some((field) => lowerKey.includes(field))
      ? '[REDACTED]'
      : redactObject(nested, options, visited);
  }
  return result;
}

/**
 * Typed audit events for the agent. Delegates to an AuditLogger and never lets a
 * failing sink break the caller: sink errors are reported on stderr.
 */
export class StructuredAuditLogger {
  constructor(
    private readonly logger: AuditLogger = new ConsoleAuditLogger(),
    private readonly redactionOptions: RedactionOptions = {},
    private readonly now: () => number = Date.now
  ) {}

  async logPlanCreated(params: { requestId?: string; goal: string; estimatedDays: number; subtaskCount: number }): Promise<void> {
    await this.emit('plan_created', params.requestId, {
      goal: redactString(params.goal, this.redactionOptions),
      estimatedDays: params.estimatedDays,
      subtaskCount: params.subtaskCount
    });
  }

  async logDayAdvanced(params: {
    requestId?: string;
    day: number;
    subtaskId: number;
    status: string;
    skippedSubtasks?: number;
  }): Promise<void> {
    await this.emit('day_advanced', params.requestId, {
      day: params.day,
      subtaskId: params.subtaskId,
      status: params.status,
      skippedSubtasks: params.skippedSubtasks
    });
  }

  async logTickSkipped(params: { requestId?: string; reason: string; currentDay: number; requestedDay?: number }): Promise<void> {
    await this.emit('tick_skipped', params.requestId, {
      reason: params.reason,
      currentDay: params.currentDay,
      requestedDay: params.requestedDay
    });
  }

  async logLLMRequest(params: {
    requestId?: string;
    provider: string;
    model: string;
    attempt: number;
    durationMs: number;
    tokensUsed?: number;
    success: boolean;
    error?: string;
  }): Promise<void> {
    await this.emit('llm_request', params.requestId, {
      provider: params.provider,
      model: params.model,
      attempt: params.attempt,
      durationMs: params.durationMs,
      tokensUsed: params.tokensUsed,
      success: params.success,
      error: params.error === undefined ? undefined : redactString(params.error, this.redactionOptions)
    });
  }

  async logError(params: { requestId?: string; error: string; code?: string; context?: Record<string, unknown> }): Promise<void> {
    await this.emit('error', params.requestId, {
      error: redactString(params.error, this.redactionOptions),
      code: params.code,
      context: params.context === undefined ? undefined : redactObject(params.context, this.redactionOptions)
    });
  }

  private async emit(eventType: AuditEventType, requestId: string | undefined, data: Record<string, unknown>): Promise<void> {
    try {
      await this.logger.log({ timestamp: this.now(), requestId, eventType, data });
    } catch (error) {
      console.error(`[ERROR] Audit sink failed for ${eventType}:`, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Gate Types
 *
 * A gate decides whether a task may run now. Gates are parsed from task
 * headers once per load; a malformed header becomes an `invalid` gate that
 * stays closed with its configuration error until the header is fixed.
 */

// ============================================================================
// Cron
// ============================================================================

/**
 * Parsed five-field cron expression (minute hour day-of-month month
 * day-of-week), evaluated in UTC
 */
export interface CronExpression {
  /** Expression as written */
  readonly source: string;
  readonly minutes: ReadonlySet<number>;
  readonly hours: ReadonlySet<number>;
  readonly daysOfMonth: ReadonlySet<number>;
  readonly months: ReadonlySet<number>;
  /** 0 = Sunday */
  readonly daysOfWeek: ReadonlySet<number>;
  /** Day-of-month field was not `*` */
  readonly domRestricted: boolean;
  /** Day-of-week field was not `*` */
  readonly dowRestricted: boolean;
}

// ============================================================================
// Gate Variants
// ============================================================================

/**
 * Numeric comparison applied to a condition probe
 */
export type ConditionOperator = 'gt' | 'lt' | 'eq' | 'ge' | 'le';

export const CONDITION_OPERATORS: readonly ConditionOperator[] = ['gt', 'lt', 'eq', 'ge', 'le'];

export function isConditionOperator(value: unknown): value is ConditionOperator {
  return value === 'gt' || value === 'lt' || value === 'eq' || value === 'ge' || value === 'le';
}

/**
 * Open once `intervalMs` has elapsed since the last successful run
 */
export interface CooldownGate {
  readonly type: 'cooldown';
  readonly intervalMs: number;
}

/**
 * Open once per schedule slot
 */
export interface CronGate {
  readonly type: 'cron';
  readonly schedule: string;
  readonly expression: CronExpression;
}

/**
 * Open while a probe's numeric output satisfies the comparison
 */
export interface ConditionGate {
  readonly type: 'condition';
  /** Shell command whose trimmed stdout is the probe value */
  readonly check: string;
  readonly operator: ConditionOperator;
  readonly threshold: number;
  readonly cooldownMs?: number;
}

/**
 * Open while a named trigger is pending
 */
export interface EventGate {
  readonly type: 'event';
  /** `startup`, `heartbeat` or `mail:<address>` */
  readonly trigger: string;
}

/**
 * Gate whose header failed validation; always closed
 */
export interface InvalidGate {
  readonly type: 'invalid';
  readonly error: string;
}

export type Gate = CooldownGate | CronGate | ConditionGate | EventGate | InvalidGate;

export type GateType = Exclude<Gate['type'], 'invalid'>;

export const GATE_TYPES: readonly GateType[] = ['cooldown', 'cron', 'condition', 'event'];

export function isGateType(value: unknown): value is GateType {
  return value === 'cooldown' || value === 'cron' || value === 'condition' || value === 'event';
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Outcome of evaluating a gate
 */
export interface GateDecision {
  readonly open: boolean;
  /** Human-readable explanation, always present */
  readonly reason: string;
  /** Set when the gate is closed because of a configuration or probe error */
  readonly error?: string;
}

/**
 * Inputs to a gate evaluation besides the gate and its run state
 */
export interface GateContext {
  readonly now: Date;
  /** Raw output of the condition probe, when one was run */
  readonly probeOutput?: string;
  /** Error from running the condition probe */
  readonly probeError?: string;
  /** Triggers pending this cycle */
  readonly pendingTriggers?: ReadonlySet<string>;
  /** Whether a failed run's `nextEligible` keeps the gate closed (respect-interval policy) */
  readonly holdFailures?: boolean;
}

/**
 * Stats forwarding payload types.
 */

/**
 * A single stat destined for a remote collector
 */
export interface Stat {
  /** Stat name, including any scope prefix */
  name: string;
  /** Numeric value */
  value: number;
  /** Microseconds since the Unix epoch */
  timestamp: number;
  /** Optional key-value tags */
  tags?: Record<string, string>;
}

/**
 * A batch of stats from one logical source
 */
export interface StatsPayload {
  source: string;
  stats: Stat[];
}

/**
 * Result of a forwarding call
 */
export interface ForwardResult {
  /** Number of stats accepted for delivery */
  numAccepted: number;
}

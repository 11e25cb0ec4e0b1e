import type { CircuitState } from '../resilience/CircuitBreaker';
import type { ErrorKind } from '../errors';
import type { CacheStrategy } from '../Options';

/**
 * Types of events that can be emitted by a Gateway
 */
export type GatewayEventType =
  | 'cache_hit'              // Fresh cached response returned
  | 'cache_miss'             // No fresh entry, going upstream
  | 'cache_stored'           // Successful response cached
  | 'breaker_state_changed'  // Circuit breaker moved between states
  | 'rate_limited'           // Rate limiter refused a call
  | 'request_failed';        // Logical call ended in a failed envelope

/**
 * Base interface for all gateway events
 */
export interface GatewayEvent {
  type: GatewayEventType;
  /** Clock time when the event occurred */
  timestamp: number;
}

export interface CacheEvent extends GatewayEvent {
  type: 'cache_hit' | 'cache_miss' | 'cache_stored';
  endpoint: string;
  fingerprint: string;
  strategy: CacheStrategy;
}

export interface BreakerStateChangedEvent extends GatewayEvent {
  type: 'breaker_state_changed';
  from: CircuitState;
  to: CircuitState;
  consecutiveFailures: number;
}

export interface RateLimitedEvent extends GatewayEvent {
  type: 'rate_limited';
  endpoint: string;
  retryAfterMs: number;
}

export interface RequestFailedEvent extends GatewayEvent {
  type: 'request_failed';
  endpoint: string;
  errorKind: ErrorKind;
  statusCode: number;
  attempts: number;
}

export type AnyGatewayEvent =
  | CacheEvent
  | BreakerStateChangedEvent
  | RateLimitedEvent
  | RequestFailedEvent;

export type GatewayEventListener = (event: AnyGatewayEvent) => void;

export interface GatewaySubscriptionOptions {
  /** Only deliver these event types (all types when omitted) */
  eventTypes?: GatewayEventType[];
}

export interface GatewaySubscription {
  id: string;
  unsubscribe(): void;
  isActive(): boolean;
}

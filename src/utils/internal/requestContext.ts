/**
 * @fileoverview Utilities for creating request contexts.
 * A request context is an object carrying a unique ID, timestamp, and other
 * relevant data for logging and tracing a single storage call. It supports
 * context propagation so nested operations share the caller's request ID.
 * @module src/utils/internal/requestContext
 */
import { trace } from '@opentelemetry/api';

import { generateRequestContextId } from '@/utils/security/idGenerator.js';

/**
 * Core structure for context information associated with a storage call.
 */
export interface RequestContext {
  /**
   * Unique ID for the context instance.
   * Used for log correlation and request tracing.
   */
  requestId: string;

  /**
   * ISO 8601 timestamp indicating when the context was created.
   */
  timestamp: string;

  /**
   * Name of the operation that created the context, e.g. `AzureBlobProvider.add`.
   */
  operation?: string;

  /**
   * Arbitrary key-value pairs. Consumers must type-check when reading them.
   */
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  /**
   * An optional parent context to inherit properties from, such as `requestId`.
   */
  parentContext?: Record<string, unknown> | RequestContext;

  /**
   * Key-value pairs merged into the new context. These override anything
   * inherited from the parent context.
   */
  additionalContext?: Record<string, unknown>;

  /**
   * A descriptive name for the operation creating this context.
   */
  operation?: string;
}

const requestContextServiceInstance = {
  /**
   * Creates a new {@link RequestContext}.
   *
   * The request ID is inherited from `parentContext` when present so that the
   * log lines of nested operations can be correlated. OpenTelemetry trace and
   * span IDs are injected if an active span exists.
   */
  createRequestContext(
    params: CreateRequestContextParams = {},
  ): RequestContext {
    const { parentContext, additionalContext, operation } = params;

    const inheritedContext: Record<string, unknown> = parentContext
      ? { ...parentContext }
      : {};

    const requestId =
      typeof inheritedContext.requestId === 'string' &&
      inheritedContext.requestId
        ? inheritedContext.requestId
        : generateRequestContextId();
    const timestamp = new Date().toISOString();

    const context: RequestContext = {
      ...inheritedContext,
      ...(additionalContext ?? {}),
      requestId,
      timestamp,
      ...(operation ? { operation } : {}),
    };

    // --- OpenTelemetry Integration ---
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      const spanContext = activeSpan.spanContext();
      context.traceId = spanContext.traceId;
      context.spanId = spanContext.spanId;
    }
    // --- End OpenTelemetry Integration ---

    return context;
  },
};

/**
 * Primary export for request context functionalities.
 */
export const requestContextService = requestContextServiceInstance;

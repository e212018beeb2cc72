/**
 * @fileoverview Unit tests for the requestContextService utilities.
 * @module tests/utils/internal/requestContext.test
 */
import { trace, TraceFlags } from '@opentelemetry/api';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { requestContextService } from '../../../src/utils/internal/requestContext.js';

describe('requestContextService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a context with a fresh request ID and timestamp', () => {
    const context = requestContextService.createRequestContext({
      operation: 'AzureBlobProvider.add',
    });

    expect(context.requestId).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
    expect(new Date(context.timestamp).toISOString()).toBe(context.timestamp);
    expect(context.operation).toBe('AzureBlobProvider.add');
  });

  it('inherits the request ID of the parent context', () => {
    const parent = requestContextService.createRequestContext({
      operation: 'parent',
      additionalContext: { tenant: 'contoso' },
    });

    const child = requestContextService.createRequestContext({
      parentContext: parent,
      operation: 'child',
    });

    expect(child.requestId).toBe(parent.requestId);
    expect(child.operation).toBe('child');
    expect(child.tenant).toBe('contoso');
  });

  it('lets additional context override inherited values', () => {
    const context = requestContextService.createRequestContext({
      parentContext: { requestId: 'PARNT-00001', path: 'old.txt' },
      additionalContext: { path: 'new.txt' },
    });

    expect(context).toMatchObject({
      requestId: 'PARNT-00001',
      path: 'new.txt',
    });
  });

  it('generates a request ID when the parent has none', () => {
    const context = requestContextService.createRequestContext({
      parentContext: { requestId: '' },
    });

    expect(context.requestId).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
  });

  it('omits the operation key when none is given', () => {
    const context = requestContextService.createRequestContext();
    expect('operation' in context).toBe(false);
  });

  it('injects trace and span IDs from the active span', () => {
    const span = trace.wrapSpanContext({
      traceId: '0af7651916cd43dd8448eb211c80319c',
      spanId: 'b7ad6b7169203331',
      traceFlags: TraceFlags.SAMPLED,
    });
    vi.spyOn(trace, 'getActiveSpan').mockReturnValue(span);

    const context = requestContextService.createRequestContext();

    expect(context.traceId).toBe('0af7651916cd43dd8448eb211c80319c');
    expect(context.spanId).toBe('b7ad6b7169203331');
  });
});

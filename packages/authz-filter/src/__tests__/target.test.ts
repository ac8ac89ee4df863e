import {describe, expect, it} from 'vitest';

import {buildTargetEndpoint, parseOutboundCluster, resolveFilterConfig} from '../index';

describe('buildTargetEndpoint', () => {
  it('defaults the instance id to localhost', () => {
    expect(buildTargetEndpoint()).toBe('outbound|50051||localhost.localhost.for.grpc.call');
    expect(buildTargetEndpoint('   ')).toBe('outbound|50051||localhost.localhost.for.grpc.call');
  });

  it('embeds a configured instance id', () => {
    expect(buildTargetEndpoint('authz-7f9c')).toBe('outbound|50051||authz-7f9c.localhost.for.grpc.call');
  });
});

describe('parseOutboundCluster', () => {
  it('splits a cluster name into port, subset and host', () => {
    expect(parseOutboundCluster('outbound|50051||pod-1.localhost.for.grpc.call')).toEqual({
      port: 50051,
      subset: '',
      host: 'pod-1.localhost.for.grpc.call'
    });
    expect(parseOutboundCluster('outbound|8080|v2|policy.svc')).toEqual({port: 8080, subset: 'v2', host: 'policy.svc'});
  });

  it('rejects malformed cluster names', () => {
    expect(parseOutboundCluster('inbound|50051||policy.svc')).toBeNull();
    expect(parseOutboundCluster('outbound|abc||policy.svc')).toBeNull();
    expect(parseOutboundCluster('outbound|70000||policy.svc')).toBeNull();
    expect(parseOutboundCluster('outbound|50051||')).toBeNull();
    expect(parseOutboundCluster('policy.svc:50051')).toBeNull();
  });
});

describe('resolveFilterConfig', () => {
  it('applies defaults and freezes the result', () => {
    const config = resolveFilterConfig({});

    expect(config).toEqual({
      target: 'outbound|50051||localhost.localhost.for.grpc.call',
      timeout_ms: 5_000,
      forward_reply_headers: false
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('accepts overrides', () => {
    expect(resolveFilterConfig({instance_id: 'pod-2', timeout_ms: 750, forward_reply_headers: true})).toEqual({
      target: 'outbound|50051||pod-2.localhost.for.grpc.call',
      timeout_ms: 750,
      forward_reply_headers: true
    });
  });

  it('rejects out-of-range timeouts', () => {
    expect(() => resolveFilterConfig({timeout_ms: 10})).toThrow();
  });
});

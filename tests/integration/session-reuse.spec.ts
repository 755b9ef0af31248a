import { describe, expect, it } from 'vitest';
import { BringUpCancelledError, RpcError } from '../../src/server/errors.js';
import { createHarness } from '../helpers/fake-relay.js';

describe('session reuse and eviction', () => {
  it('reuses a live session with only a liveness probe', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    const first = await sessionBroker.getOrCreateSession('alice-laptop');
    relay.reset();

    const second = await sessionBroker.getOrCreateSession('alice-laptop');

    expect(second).toBe(first);
    expect(relay.calls.map((c) => c.kind)).toEqual(['status']);
    expect(broker.ctx.counters.sessionReuseTotal).toBe(1);
  });

  it('evicts a dead session and brings up a fresh one', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    await sessionBroker.getOrCreateSession('alice-laptop');
    relay.statusFor = (id) => id !== 'session-1';

    const next = await sessionBroker.getOrCreateSession('alice-laptop');

    expect(next.sessionId).toBe('session-2');
    expect(next.nextRequestId).toBe(3);
    expect(relay.count('notify')).toBe(2);
    expect(sessionBroker.listSessions()).toEqual([next]);
    expect(broker.ctx.counters.staleSessionEvictTotal).toBe(1);
  });

  it('issues strictly increasing request ids', async () => {
    const { relay, sessionBroker } = createHarness();
    const session = await sessionBroker.getOrCreateSession('alice-laptop');

    for (const method of ['tools/call', 'tools/call', 'resources/list']) {
      await sessionBroker.sendRequest(session, method);
    }

    expect(relay.envelopes.slice(3).map((e) => e.id)).toEqual([3, 4, 5]);
    expect(session.nextRequestId).toBe(6);
  });

  it('does not reuse an id after a failed request', async () => {
    const { relay, sessionBroker } = createHarness();
    const session = await sessionBroker.getOrCreateSession('alice-laptop');
    const accept = relay.rpc;
    relay.rpc = () => ({ status: 502, body: 'bad gateway' });

    await expect(sessionBroker.sendRequest(session, 'tools/call')).rejects.toBeInstanceOf(RpcError);
    relay.rpc = accept;
    const reply = await sessionBroker.sendRequest(session, 'tools/call');

    expect(reply.id).toBe(4);
  });

  it('updates lastActivityAt on success only', async () => {
    const { clock, relay, sessionBroker } = createHarness();
    const session = await sessionBroker.getOrCreateSession('alice-laptop');
    clock.advance(500);
    await sessionBroker.sendRequest(session, 'tools/call');
    expect(session.lastActivityAt).toBe(3_500);

    clock.advance(500);
    relay.rpc = () => ({ status: 500 });
    await sessionBroker.sendRequest(session, 'tools/call').catch(() => undefined);
    expect(session.lastActivityAt).toBe(3_500);
  });

  it('surfaces HTTP failures as RpcError and keeps the session', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    const session = await sessionBroker.getOrCreateSession('alice-laptop');
    relay.rpc = () => ({ status: 502, body: 'bad gateway' });

    const error = await sessionBroker.sendRequest(session, 'tools/call').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({ status: 502, method: 'tools/call', message: "tools/call on 'alice-laptop' failed: relay returned 502" });
    expect(sessionBroker.listSessions()).toEqual([session]);
    expect(broker.ctx.counters.rpcFailureTotal).toBe(1);
  });

  it('surfaces JSON-RPC error replies as RpcError', async () => {
    const { relay, sessionBroker } = createHarness();
    const session = await sessionBroker.getOrCreateSession('alice-laptop');
    relay.rpc = (envelope) => ({ status: 200, body: { jsonrpc: '2.0', id: envelope.id, error: { code: -32601, message: 'Method not found' } } });

    const error = await sessionBroker.sendRequest(session, 'tools/unknown').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({ rpcCode: -32601, message: "tools/unknown on 'alice-laptop' failed: Method not found" });
  });

  it('brings up on demand through sendMcpRequest', async () => {
    const { sessionBroker } = createHarness();

    const { session, reply } = await sessionBroker.sendMcpRequest('alice-laptop', 'tools/call', { name: 'read_text_file', arguments: { filePath: 'C:\\notes.txt' } });

    expect(session.sessionId).toBe('session-1');
    expect(reply.result).toEqual({ content: [{ type: 'text', text: 'handled tools/call' }] });
  });

  it('evicts on request', async () => {
    const { sessionBroker } = createHarness();
    await sessionBroker.getOrCreateSession('alice-laptop');

    expect(sessionBroker.evict('alice-laptop')).toBe(true);
    expect(sessionBroker.evict('alice-laptop')).toBe(false);
    expect(sessionBroker.getBringUpState('alice-laptop')).toBe('idle');
  });
});

describe('concurrent bring-up', () => {
  it('shares one in-flight bring-up per client name', async () => {
    const { relay, sessionBroker, broker } = createHarness();

    const [a, b] = await Promise.all([sessionBroker.getOrCreateSession('alice-laptop'), sessionBroker.getOrCreateSession('alice-laptop')]);

    expect(a).toBe(b);
    expect(relay.count('notify')).toBe(1);
    expect(broker.ctx.counters.singleFlightJoinTotal).toBe(1);
    expect(broker.ctx.counters.bringUpTotal).toBe(1);
  });

  it('keeps the shared bring-up going for a joiner when the starter aborts', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    const starter = new AbortController();
    relay.statusFor = (_id, now) => {
      if (now >= 1_000) starter.abort();
      return now >= 2_000;
    };

    const [first, second] = await Promise.allSettled([
      sessionBroker.getOrCreateSession('alice-laptop', starter.signal),
      sessionBroker.getOrCreateSession('alice-laptop')
    ]);

    expect(first.status).toBe('rejected');
    expect(first.status === 'rejected' && first.reason).toBeInstanceOf(BringUpCancelledError);
    expect(second.status === 'fulfilled' && second.value.sessionId).toBe('session-1');
    expect(relay.count('notify')).toBe(1);
    expect(broker.ctx.counters.bringUpFailureByPhase).toEqual({});
    expect(broker.ctx.counters.bringUpSuccessTotal).toBe(1);
  });

  it('cancels the shared bring-up once every waiting caller has aborted', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    const a = new AbortController();
    const b = new AbortController();
    relay.statusFor = (_id, now) => {
      if (now >= 1_000) a.abort();
      if (now >= 2_000) b.abort();
      return false;
    };

    const [first, second] = await Promise.allSettled([
      sessionBroker.getOrCreateSession('alice-laptop', a.signal),
      sessionBroker.getOrCreateSession('alice-laptop', b.signal)
    ]);

    expect(first.status === 'rejected' && first.reason).toMatchObject({ code: 'cancelled', during: 'connect' });
    expect(second.status === 'rejected' && second.reason).toMatchObject({ code: 'cancelled', during: 'connect' });
    expect(relay.count('status')).toBe(3);
    expect(broker.ctx.counters.bringUpFailureByPhase).toEqual({ cancelled: 1 });
    expect(sessionBroker.getBringUpState('alice-laptop')).toBe('idle');
  });

  it('races when single-flight is disabled and keeps the last writer', async () => {
    const { relay, sessionBroker } = createHarness({ LOCAL_MCP_SINGLE_FLIGHT: 'false' });

    const [a, b] = await Promise.all([sessionBroker.getOrCreateSession('alice-laptop'), sessionBroker.getOrCreateSession('alice-laptop')]);

    expect(a).not.toBe(b);
    expect(relay.count('notify')).toBe(2);
    expect(sessionBroker.listSessions()).toHaveLength(1);
    expect([a, b]).toContain(sessionBroker.listSessions()[0]);
  });
});

describe('cancellation', () => {
  it('aborts a bring-up during the connect wait', async () => {
    const { relay, sessionBroker, broker } = createHarness();
    const controller = new AbortController();
    relay.statusFor = (_id, now) => {
      if (now >= 3_000) controller.abort();
      return false;
    };

    const error = await sessionBroker.getOrCreateSession('alice-laptop', controller.signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BringUpCancelledError);
    expect(error).toMatchObject({ code: 'cancelled', during: 'connect' });
    expect(relay.calls.filter((c) => c.kind === 'status')).toHaveLength(4);
    expect(broker.ctx.counters.bringUpFailureByPhase).toEqual({ cancelled: 1 });
    expect(sessionBroker.getBringUpState('alice-laptop')).toBe('idle');
  });

  it('rejects immediately when already aborted', async () => {
    const { relay, sessionBroker } = createHarness();
    const controller = new AbortController();
    controller.abort();

    const error = await sessionBroker.getOrCreateSession('alice-laptop', controller.signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BringUpCancelledError);
    expect(error).toMatchObject({ during: 'notify' });
    expect(relay.calls).toEqual([]);
  });
});

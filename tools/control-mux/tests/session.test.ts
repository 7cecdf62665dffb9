import { describe, it, expect, vi, afterEach } from 'vitest';
import { ControlSession, type ControlSessionOptions } from '../src/session.js';
import {
  ConnectionError,
  ControlRequestError,
  DecodeError,
  ProtocolError,
  SessionClosedError,
  TimeoutError,
  type ControlMuxError,
} from '../src/errors.js';
import type { TranscriptLogger } from '../src/logger.js';
import type { CanUseTool, PermissionResult } from '../src/protocol-types.js';
import { collect, createWireHarness, type WireHarness } from './helpers/wire.js';

const sessions: ControlSession[] = [];

function startSession(options: ControlSessionOptions = {}): { session: ControlSession; wire: WireHarness } {
  const wire = createWireHarness();
  const session = new ControlSession(wire.transport, options);
  sessions.push(session);
  session.start();
  return { session, wire };
}

async function first<T>(iterable: AsyncIterable<T>): Promise<T | undefined> {
  for await (const item of iterable) return item;
  return undefined;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.close()));
});

describe('ControlSession', () => {
  describe('wire scenarios', () => {
    it('delivers a result line to the message sink without control traffic', async () => {
      const { session, wire } = startSession();

      wire.send('{"type":"result","subtype":"success","duration_ms":120,"session_id":"s1"}');

      expect(await first(session.messages())).toEqual({
        type: 'result',
        subtype: 'success',
        duration_ms: 120,
        session_id: 's1',
      });
      expect(wire.written).toEqual([]);
    });

    it('allows a permission check when no callback is registered', async () => {
      const { wire } = startSession();

      wire.send(
        '{"type":"control_request","request_id":"r1","request":{"subtype":"can_use_tool","tool_name":"Bash","input":{}}}',
      );

      expect(await wire.nextWritten()).toBe(
        '{"type":"control_response","response":{"subtype":"success","request_id":"r1","response":{"behavior":"allow"}}}',
      );
    });

    it('answers a denied permission check with a success response carrying the deny', async () => {
      const { wire } = startSession({
        canUseTool: () => ({ behavior: 'deny', message: 'blocked' }),
      });

      wire.send(
        '{"type":"control_request","request_id":"r1","request":{"subtype":"can_use_tool","tool_name":"Bash","input":{}}}',
      );

      expect(await wire.nextWritten()).toBe(
        '{"type":"control_response","response":{"subtype":"success","request_id":"r1","response":{"behavior":"deny","message":"blocked"}}}',
      );
    });

    it('reports a malformed line and still delivers the next one', async () => {
      const { session, wire } = startSession();

      wire.send('not-json');
      wire.send('{"type":"assistant","message":{"content":[]}}');

      const error = await first(session.errors());
      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ code: 'DECODE', line: 'not-json' });
      expect(await first(session.messages())).toEqual({ type: 'assistant', message: { content: [] } });
    });
  });

  describe('inbound control requests', () => {
    it('answers a missing hook id with an error response', async () => {
      const { wire } = startSession();

      wire.send({
        type: 'control_request',
        request_id: 'r7',
        request: { subtype: 'hook_callback', callback_id: 'hook_PreToolUse_3', input: {} },
      });

      expect(await wire.nextWritten()).toBe(
        '{"type":"control_response","response":{"subtype":"error","request_id":"r7","error":"callback not found: hook_PreToolUse_3"}}',
      );
    });

    it('writes responses in completion order, correlated by id', async () => {
      const slow = deferred<PermissionResult>();
      const canUseTool = vi.fn<CanUseTool>((toolName) =>
        toolName === 'Slow' ? slow.promise : { behavior: 'allow' },
      );
      const { wire } = startSession({ canUseTool });

      wire.send({ type: 'control_request', request_id: 'a', request: { subtype: 'can_use_tool', tool_name: 'Slow' } });
      wire.send({ type: 'control_request', request_id: 'b', request: { subtype: 'can_use_tool', tool_name: 'Fast' } });

      const firstResponse = await wire.nextWrittenJson();
      expect(firstResponse.response).toMatchObject({ request_id: 'b', subtype: 'success' });

      slow.resolve({ behavior: 'deny', message: 'too slow' });
      const secondResponse = await wire.nextWrittenJson();
      expect(secondResponse.response).toEqual({
        subtype: 'success',
        request_id: 'a',
        response: { behavior: 'deny', message: 'too slow' },
      });
    });

    it('keeps delivering conversation lines while a callback is running', async () => {
      const slow = deferred<PermissionResult>();
      const { session, wire } = startSession({ canUseTool: () => slow.promise });

      wire.send({ type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });
      wire.send({ type: 'assistant', message: { content: [] } });

      expect(await first(session.messages())).toMatchObject({ type: 'assistant' });
      expect(session.inflightCount).toBe(1);
      slow.resolve({ behavior: 'allow' });
      await wire.nextWritten();
    });

    it('aborts the callback signal on a cancel request and still answers once', async () => {
      const { wire } = startSession({
        canUseTool: (_tool, _input, { signal }) =>
          new Promise<PermissionResult>((resolve) => {
            signal.addEventListener('abort', () => resolve({ behavior: 'deny', message: 'cancelled' }));
          }),
      });

      wire.send({ type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });
      await wait(10);
      wire.send({ type: 'control_cancel_request', request_id: 'r1' });

      expect(await wire.nextWrittenJson()).toEqual({
        type: 'control_response',
        response: { subtype: 'success', request_id: 'r1', response: { behavior: 'deny', message: 'cancelled' } },
      });
    });

    it('reports a reused in-flight request id and answers only the first', async () => {
      const slow = deferred<PermissionResult>();
      const canUseTool = vi.fn<CanUseTool>(() => slow.promise);
      const { session, wire } = startSession({ canUseTool });
      const request = { type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } };

      wire.send(request);
      wire.send(request);

      const error = await first(session.errors());
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error?.message).toBe('duplicate request id: r1');

      slow.resolve({ behavior: 'allow' });
      await wire.nextWritten();
      await wait(20);
      expect(wire.written).toHaveLength(1);
      expect(canUseTool).toHaveBeenCalledTimes(1);
    });

    it('reports a control request without an id', async () => {
      const { session, wire } = startSession();

      wire.send({ type: 'control_request', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });

      expect((await first(session.errors()))?.message).toBe('control request without request_id');
      expect(wire.written).toEqual([]);
    });
  });

  describe('outbound control requests', () => {
    it('writes interrupt as a fire-and-forget request', async () => {
      const { session, wire } = startSession();

      await expect(session.interrupt()).resolves.toBe('req_1');
      expect(await wire.nextWritten()).toBe('{"type":"control_request","request_id":"req_1","request":{"subtype":"interrupt"}}');
    });

    it('absorbs the reply to a fire-and-forget request', async () => {
      const { session, wire } = startSession();
      await session.interrupt();

      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_1', response: {} } });
      wire.end();

      expect(await collect(session.errors())).toEqual([]);
    });

    it('resolves an awaited request with the correlated payload', async () => {
      const { session, wire } = startSession();

      const reply = session.setModel('test-model');
      expect(await wire.nextWrittenJson()).toEqual({
        type: 'control_request',
        request_id: 'req_1',
        request: { subtype: 'set_model', model: 'test-model' },
      });

      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_1', response: { model: 'test-model' } } });
      await expect(reply).resolves.toEqual({ model: 'test-model' });
    });

    it('sends initialize with the registered hook configuration', async () => {
      const { session, wire } = startSession({
        hooks: { PreToolUse: [{ matcher: 'Bash', hooks: [() => undefined] }] },
      });

      const reply = session.initialize();
      expect(await wire.nextWritten()).toBe(
        '{"type":"control_request","request_id":"req_1","request":{"subtype":"initialize","hooks":{"PreToolUse":[{"matcher":"Bash","callback_id":"hook_PreToolUse_0"}]}}}',
      );
      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_1' } });
      await expect(reply).resolves.toEqual({});
    });

    it('rejects an awaited request on an error response', async () => {
      const { session, wire } = startSession();

      const reply = session.setPermissionMode('plan');
      await wire.nextWritten();
      wire.send({ type: 'control_response', response: { subtype: 'error', request_id: 'req_1', error: 'not allowed' } });

      const err = await reply.catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ControlRequestError);
      expect(err).toMatchObject({ message: 'set_permission_mode request req_1 failed: not allowed' });
    });

    it('times out an awaited request that gets no reply', async () => {
      const { session } = startSession({ controlTimeoutMs: 30 });

      await expect(session.setModel(null)).rejects.toBeInstanceOf(TimeoutError);
    });

    it('resolves concurrent awaited requests by id, not by order', async () => {
      const { session, wire } = startSession();

      const a = session.setModel('a');
      const b = session.setModel('b');
      await wire.nextWritten();
      await wire.nextWritten();

      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_2', response: { which: 'b' } } });
      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_1', response: { which: 'a' } } });

      await expect(a).resolves.toEqual({ which: 'a' });
      await expect(b).resolves.toEqual({ which: 'b' });
    });

    it('reports a response nobody is waiting for', async () => {
      const { session, wire } = startSession();

      wire.send({ type: 'control_response', response: { subtype: 'success', request_id: 'req_99', response: {} } });

      const error = await first(session.errors());
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error?.message).toBe('control response for unknown request: req_99');
    });

    it('reports a malformed control response', async () => {
      const { session, wire } = startSession();

      wire.send({ type: 'control_response', response: 'oops' });

      expect((await first(session.errors()))?.message).toBe('malformed control_response');
    });
  });

  describe('conversation output', () => {
    it('writes a user message envelope', async () => {
      const { session, wire } = startSession();

      await session.sendUserMessage('hi');

      expect(await wire.nextWritten()).toBe(
        '{"type":"user","message":{"role":"user","content":"hi"},"parent_tool_use_id":null,"session_id":"default"}',
      );
    });
  });

  describe('backpressure', () => {
    it('stops reading while the message sink is full', async () => {
      const { session, wire } = startSession({ messageBufferSize: 1 });

      wire.send({ type: 'assistant', n: 1 });
      wire.send({ type: 'assistant', n: 2 });
      wire.send({ type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });
      await wait(30);

      // Second message is waiting on the full sink, so the request is not read yet.
      expect(wire.written).toEqual([]);

      const received: unknown[] = [];
      for await (const message of session.messages()) {
        received.push(message);
        if (received.length === 2) break;
      }
      expect(received).toEqual([
        { type: 'assistant', n: 1 },
        { type: 'assistant', n: 2 },
      ]);
      expect(JSON.parse(await wire.nextWritten())).toMatchObject({ response: { request_id: 'r1' } });
    });
  });

  describe('end of stream', () => {
    it('closes both sinks and fails pending requests on EOF', async () => {
      const { session, wire } = startSession();
      const reply = session.setModel('m').catch((e: unknown) => e);
      await wire.nextWritten();

      wire.send({ type: 'result', subtype: 'success', session_id: 's1' });
      wire.end();

      expect(await collect(session.messages())).toEqual([{ type: 'result', subtype: 'success', session_id: 's1' }]);
      expect(await collect(session.errors())).toEqual([]);
      const err = await reply;
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err).toMatchObject({ message: 'transport closed' });
    });
  });

  describe('close', () => {
    it('is idempotent and returns the same promise', async () => {
      const { session } = startSession();

      const a = session.close();
      const b = session.close();

      expect(a).toBe(b);
      await a;
      await expect(session.close()).resolves.toBeUndefined();
      expect(session.closed).toBe(true);
    });

    it('unblocks a consumer waiting on the sinks', async () => {
      const { session } = startSession();
      const messages = collect(session.messages());
      const errors = collect<ControlMuxError>(session.errors());

      await session.close();

      expect(await messages).toEqual([]);
      expect(await errors).toEqual([]);
    });

    it('rejects pending requests and later operations with SessionClosedError', async () => {
      const { session, wire } = startSession();
      const reply = session.setModel('m').catch((e: unknown) => e);
      await wire.nextWritten();

      await session.close();

      expect(await reply).toBeInstanceOf(SessionClosedError);
      await expect(session.sendUserMessage('late')).rejects.toBeInstanceOf(SessionClosedError);
      await expect(session.interrupt()).rejects.toBeInstanceOf(SessionClosedError);
      expect(() => session.start()).toThrow(SessionClosedError);
    });

    it('lets an in-flight callback finish and write its response', async () => {
      const { session, wire } = startSession({
        canUseTool: (_tool, _input, { signal }) =>
          new Promise<PermissionResult>((resolve) => {
            signal.addEventListener('abort', () => resolve({ behavior: 'deny', message: 'session closing' }));
          }),
      });

      wire.send({ type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });
      await wait(10);
      await session.close();
      await wait(10);

      expect(wire.written).toEqual([
        '{"type":"control_response","response":{"subtype":"success","request_id":"r1","response":{"behavior":"deny","message":"session closing"}}}',
      ]);
    });

    it('abandons a callback that outlives the grace period', async () => {
      const { session, wire } = startSession({
        closeGraceMs: 20,
        canUseTool: () => new Promise<PermissionResult>(() => undefined),
      });

      wire.send({ type: 'control_request', request_id: 'r1', request: { subtype: 'can_use_tool', tool_name: 'Bash' } });
      await wait(10);
      await session.close();
      await wait(10);

      expect(wire.written).toEqual([]);
    });

    it('mirrors wire traffic into the transcript and closes it', async () => {
      const transcript: TranscriptLogger = { logFilePath: '/tmp/test.log', write: vi.fn(), close: vi.fn(async () => undefined) };
      const { session, wire } = startSession({ transcript });

      wire.send('{"type":"control_request","request_id":"r1","request":{"subtype":"can_use_tool","tool_name":"Bash"}}');
      await wire.nextWritten();
      await session.close();

      expect(vi.mocked(transcript.write).mock.calls).toEqual([
        ['in', '{"type":"control_request","request_id":"r1","request":{"subtype":"can_use_tool","tool_name":"Bash"}}'],
        ['out', '{"type":"control_response","response":{"subtype":"success","request_id":"r1","response":{"behavior":"allow"}}}'],
      ]);
      expect(transcript.close).toHaveBeenCalledOnce();
    });
  });
});
